import { NextResponse, type NextRequest } from 'next/server';
import { withAnalytics } from '@/lib/analytics/ingestion';
import { queryParam, serializeSummary } from '@/lib/analytics/serializers';
import { requireCaller } from '@/lib/auth/guards';
import { getTrafficSummary } from '@/lib/services/analytics-report.service';

export const dynamic = 'force-dynamic';

export const GET = withAnalytics('/api/analytics/summary', async (request: NextRequest) => {
  const caller = requireCaller(request.headers);
  const params = request.nextUrl.searchParams;
  const summary = await getTrafficSummary(caller, queryParam(params, 'hours'));
  return NextResponse.json(serializeSummary(summary));
});
