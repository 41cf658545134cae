/**
 * Ingestion Path
 *
 * Route handlers opt in with `withAnalytics(route, handler)`. The wrapper
 * captures request/response metadata synchronously, hands it to the
 * dispatcher and returns the response untouched; identity lookup, geo
 * resolution and the store write all happen on a detached task afterwards.
 */

import type { NextRequest } from 'next/server';
import { env } from '@/lib/env';
import { errorResponse, statusCodeFor, toError } from '@/lib/error-logging';
import { logger } from '@/lib/logger';
import {
  clientIp,
  contentLength,
  type CaptureTarget,
  type RequestCapture,
} from './record-builder';
import { getTelemetryDispatcher } from './runtime';
import type { JsonValue } from './types';

export interface WithAnalyticsOptions {
  /** Defaults to the process-wide dispatcher, resolved per request */
  dispatcher?: () => CaptureTarget;
  skipPaths?: readonly string[];
  extraData?: Record<string, JsonValue>;
}

type RouteHandler<C> = (request: NextRequest, context: C) => Promise<Response> | Response;

export function isSkippedPath(path: string, skipPaths: readonly string[]): boolean {
  return skipPaths.some(
    (prefix) => path === prefix || path.startsWith(prefix.endsWith('/') ? prefix : `${prefix}/`)
  );
}

/**
 * Wrap a route handler so every completed request yields one telemetry record.
 * `route` is the route template (e.g. `/api/courses/[id]`), never the raw URL.
 */
export function withAnalytics<C = unknown>(
  route: string,
  handler: RouteHandler<C>,
  options: WithAnalyticsOptions = {}
): (request: NextRequest, context: C) => Promise<Response> {
  return async (request, context) => {
    const startedAt = performance.now();
    let response: Response;
    let errorMessage: string | undefined;

    try {
      response = await handler(request, context);
    } catch (error) {
      errorMessage = toError(error).message;
      response = errorResponse(error);
      if (statusCodeFor(error) >= 500) {
        logger.error(`Unhandled error in ${request.method} ${route}`, toError(error));
      }
    }

    const responseTimeMs = performance.now() - startedAt;

    try {
      record(request, response, route, responseTimeMs, errorMessage, options);
    } catch (error) {
      logger.error('Failed to capture request telemetry', toError(error), { route });
    }

    return response;
  };
}

function record(
  request: NextRequest,
  response: Response,
  route: string,
  responseTimeMs: number,
  errorMessage: string | undefined,
  options: WithAnalyticsOptions
): void {
  const skipPaths = options.skipPaths ?? env.ANALYTICS_SKIP_PATHS;
  if (isSkippedPath(route, skipPaths)) {
    return;
  }

  const wantsBody =
    response.status >= 400 &&
    !errorMessage &&
    (response.headers.get('content-type') ?? '').includes('application/json') &&
    !response.bodyUsed;

  const capture: RequestCapture = {
    endpoint: route,
    method: request.method,
    statusCode: response.status,
    responseTimeMs,
    headers: request.headers,
    ipAddress: clientIp(request.headers),
    userAgent: request.headers.get('user-agent') ?? undefined,
    requestSize: contentLength(request.headers),
    responseSize: contentLength(response.headers),
    errorMessage,
    errorBody: wantsBody ? response.clone() : undefined,
    extraData: options.extraData,
  };

  const target = options.dispatcher ? options.dispatcher() : getTelemetryDispatcher();
  target.dispatch(capture);
}
