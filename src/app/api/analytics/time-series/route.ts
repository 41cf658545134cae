import { NextResponse, type NextRequest } from 'next/server';
import { withAnalytics } from '@/lib/analytics/ingestion';
import { queryParam, serializeTimeSeriesPoint } from '@/lib/analytics/serializers';
import { requireCaller } from '@/lib/auth/guards';
import { getTimeSeries } from '@/lib/services/analytics-report.service';

export const dynamic = 'force-dynamic';

export const GET = withAnalytics('/api/analytics/time-series', async (request: NextRequest) => {
  const caller = requireCaller(request.headers);
  const params = request.nextUrl.searchParams;
  const points = await getTimeSeries(
    caller,
    queryParam(params, 'hours'),
    queryParam(params, 'interval_minutes')
  );
  return NextResponse.json(points.map(serializeTimeSeriesPoint));
});
