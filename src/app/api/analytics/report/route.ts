import { NextResponse, type NextRequest } from 'next/server';
import { withAnalytics } from '@/lib/analytics/ingestion';
import { queryParam, serializeReport } from '@/lib/analytics/serializers';
import { requireCaller } from '@/lib/auth/guards';
import { getAnalyticsReport } from '@/lib/services/analytics-report.service';

export const dynamic = 'force-dynamic';

export const GET = withAnalytics('/api/analytics/report', async (request: NextRequest) => {
  const caller = requireCaller(request.headers);
  const params = request.nextUrl.searchParams;
  const report = await getAnalyticsReport(caller, queryParam(params, 'hours'));
  return NextResponse.json(serializeReport(report));
});
