import { NextResponse, type NextRequest } from 'next/server';
import { withAnalytics } from '@/lib/analytics/ingestion';
import { queryParam, serializeEndpointStat } from '@/lib/analytics/serializers';
import { requireCaller } from '@/lib/auth/guards';
import { getEndpointStats } from '@/lib/services/analytics-report.service';

export const dynamic = 'force-dynamic';

export const GET = withAnalytics('/api/analytics/endpoints', async (request: NextRequest) => {
  const caller = requireCaller(request.headers);
  const params = request.nextUrl.searchParams;
  const stats = await getEndpointStats(caller, queryParam(params, 'hours'));
  return NextResponse.json(stats.map(serializeEndpointStat));
});
