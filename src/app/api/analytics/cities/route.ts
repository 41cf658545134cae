import { NextResponse, type NextRequest } from 'next/server';
import { withAnalytics } from '@/lib/analytics/ingestion';
import { queryParam, serializeCityStat } from '@/lib/analytics/serializers';
import { requireCaller } from '@/lib/auth/guards';
import { getCityStats } from '@/lib/services/analytics-report.service';

export const dynamic = 'force-dynamic';

export const GET = withAnalytics('/api/analytics/cities', async (request: NextRequest) => {
  const caller = requireCaller(request.headers);
  const params = request.nextUrl.searchParams;
  const stats = await getCityStats(caller, queryParam(params, 'hours'), queryParam(params, 'limit'));
  return NextResponse.json(stats.map(serializeCityStat));
});
