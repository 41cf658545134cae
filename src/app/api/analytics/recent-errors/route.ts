import { NextResponse, type NextRequest } from 'next/server';
import { withAnalytics } from '@/lib/analytics/ingestion';
import { queryParam, serializeRecord } from '@/lib/analytics/serializers';
import { requireCaller } from '@/lib/auth/guards';
import { getRecentErrors } from '@/lib/services/analytics-report.service';

export const dynamic = 'force-dynamic';

export const GET = withAnalytics('/api/analytics/recent-errors', async (request: NextRequest) => {
  const caller = requireCaller(request.headers);
  const params = request.nextUrl.searchParams;
  const records = await getRecentErrors(caller, queryParam(params, 'limit'));
  return NextResponse.json(records.map(serializeRecord));
});
