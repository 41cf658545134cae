import { z } from 'zod';
import { getCaller } from '@/lib/auth/guards';
import { toError } from '@/lib/error-logging';
import { logger } from '@/lib/logger';
import { normalizeGeo, type GeoResolver } from './geo';
import { newTelemetryRecordSchema } from './schemas';
import type { JsonValue, NewTelemetryRecord } from './types';

const MAX_ENDPOINT = 255;
const MAX_USER_ID = 64;
const MAX_IP_ADDRESS = 45;
const MAX_ERROR_MESSAGE = 1000;
const MAX_USER_AGENT = 500;

const ipAddressSchema = z.string().max(MAX_IP_ADDRESS).ip();

export interface RequestCapture {
  endpoint: string;
  method: string;
  statusCode: number;
  responseTimeMs: number;
  headers: Headers;
  ipAddress?: string;
  userAgent?: string;
  requestSize?: number;
  responseSize?: number;
  errorMessage?: string;
  /** Clone of a JSON error response, read off the request path */
  errorBody?: Response;
  extraData?: Record<string, JsonValue>;
}

export interface RecordBuilderDeps {
  geoResolver: GeoResolver;
  identify?: (headers: Headers) => string | undefined;
}

export function clientIp(headers: Headers): string | undefined {
  const forwarded = headers.get('x-forwarded-for');
  if (forwarded) {
    const first = forwarded.split(',')[0]?.trim();
    if (first) return first;
  }
  return headers.get('x-real-ip')?.trim() || undefined;
}

export function contentLength(headers: Headers): number | undefined {
  const value = headers.get('content-length');
  if (!value || !/^\d+$/.test(value)) return undefined;
  const length = Number(value);
  return Number.isSafeInteger(length) ? length : undefined;
}

/**
 * Client-supplied addresses are kept only when they parse as IPv4 or IPv6
 */
export function usableIpAddress(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return ipAddressSchema.safeParse(value).success ? value : undefined;
}

/**
 * Identities that do not fit the column are recorded as anonymous
 */
export function usableUserId(value: string | undefined): string | undefined {
  if (!value || value.length > MAX_USER_ID) return undefined;
  return value;
}

function truncate(value: string | undefined, max: number): string | undefined {
  if (value === undefined) return undefined;
  return value.length > max ? value.slice(0, max) : value;
}

/**
 * Pulls a message out of `{ error: { message } }`, `{ error: "..." }`,
 * `{ message }` or `{ detail }` bodies
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;

  if ('error' in body) {
    const error = body.error;
    if (typeof error === 'string') return error;
    if (typeof error === 'object' && error !== null && 'message' in error) {
      return typeof error.message === 'string' ? error.message : undefined;
    }
  }
  if ('message' in body && typeof body.message === 'string') return body.message;
  if ('detail' in body && typeof body.detail === 'string') return body.detail;
  return undefined;
}

async function readErrorBody(response: Response): Promise<string | undefined> {
  const contentType = response.headers.get('content-type') ?? '';
  if (!contentType.includes('application/json')) {
    await response.body?.cancel();
    return undefined;
  }
  return extractErrorMessage(await response.json());
}

function identifyFromSession(headers: Headers): string | undefined {
  return getCaller(headers)?.userId;
}

/**
 * Turn a capture into a validated record. Identity and geo failures degrade
 * to an anonymous or location-less record instead of dropping it, and
 * optional metadata that would not fit is left out. Only the endpoint,
 * method, status and timing can reject a record.
 */
export async function buildTelemetryRecord(
  capture: RequestCapture,
  deps: RecordBuilderDeps
): Promise<NewTelemetryRecord> {
  const identify = deps.identify ?? identifyFromSession;

  const ipAddress = usableIpAddress(capture.ipAddress);
  if (capture.ipAddress !== undefined && ipAddress === undefined) {
    logger.debug('Ignoring unusable client address', { length: capture.ipAddress.length });
  }

  let userId: string | undefined;
  try {
    userId = usableUserId(identify(capture.headers));
  } catch (error) {
    logger.debug('Telemetry caller lookup failed', { error: toError(error).message });
  }

  let geo: NewTelemetryRecord['geo'];
  try {
    geo = normalizeGeo(
      await deps.geoResolver.resolve({ ipAddress, headers: capture.headers })
    ) ?? undefined;
  } catch (error) {
    logger.warn('Geo resolution failed; recording without location', {
      ipAddress,
      error: toError(error).message,
    });
  }

  let errorMessage: string | undefined;
  if (capture.statusCode >= 400) {
    errorMessage = capture.errorMessage;
    if (!errorMessage && capture.errorBody) {
      try {
        errorMessage = await readErrorBody(capture.errorBody);
      } catch (error) {
        logger.debug('Could not read error response body', { error: toError(error).message });
      }
    }
  }

  return newTelemetryRecordSchema.parse({
    endpoint: truncate(capture.endpoint, MAX_ENDPOINT),
    method: capture.method.toUpperCase(),
    statusCode: capture.statusCode,
    responseTimeMs: capture.responseTimeMs,
    userId,
    ipAddress,
    userAgent: truncate(capture.userAgent, MAX_USER_AGENT),
    requestSize: capture.requestSize,
    responseSize: capture.responseSize,
    geo,
    errorMessage: truncate(errorMessage, MAX_ERROR_MESSAGE),
    extraData: capture.extraData,
  });
}

/**
 * Anything that accepts captures for detached processing
 */
export interface CaptureTarget {
  dispatch(capture: RequestCapture): boolean;
}
