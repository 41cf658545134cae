import { NextResponse, type NextRequest } from 'next/server';
import { withAnalytics } from '@/lib/analytics/ingestion';
import { queryParam, serializeCountryStat } from '@/lib/analytics/serializers';
import { requireCaller } from '@/lib/auth/guards';
import { getGeographicStats } from '@/lib/services/analytics-report.service';

export const dynamic = 'force-dynamic';

export const GET = withAnalytics('/api/analytics/geographic', async (request: NextRequest) => {
  const caller = requireCaller(request.headers);
  const params = request.nextUrl.searchParams;
  const stats = await getGeographicStats(caller, queryParam(params, 'hours'));
  return NextResponse.json(stats.map(serializeCountryStat));
});
