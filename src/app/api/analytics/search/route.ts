import { NextResponse, type NextRequest } from 'next/server';
import { withAnalytics } from '@/lib/analytics/ingestion';
import { queryParam, serializeRecord } from '@/lib/analytics/serializers';
import { requireCaller } from '@/lib/auth/guards';
import { searchTelemetry } from '@/lib/services/analytics-report.service';

export const dynamic = 'force-dynamic';

export const GET = withAnalytics('/api/analytics/search', async (request: NextRequest) => {
  const caller = requireCaller(request.headers);
  const params = request.nextUrl.searchParams;
  const records = await searchTelemetry(caller, {
    endpoint: queryParam(params, 'endpoint'),
    method: queryParam(params, 'method'),
    statusCode: queryParam(params, 'status_code'),
    userId: queryParam(params, 'user_id'),
    minResponseTimeMs: queryParam(params, 'min_response_time'),
    maxResponseTimeMs: queryParam(params, 'max_response_time'),
    startDate: queryParam(params, 'start_date'),
    endDate: queryParam(params, 'end_date'),
    limit: queryParam(params, 'limit'),
    offset: queryParam(params, 'offset'),
  });
  return NextResponse.json(records.map(serializeRecord));
});
