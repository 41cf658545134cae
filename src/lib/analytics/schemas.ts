import { z } from 'zod';
import type { GeoLocation, JsonValue, NewTelemetryRecord } from './types';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const jsonRecordSchema = z.record(jsonValueSchema);

const optionalText = (max: number) => z.string().min(1).max(max).optional();

/**
 * A resolved location is only usable when every field is present; resolvers
 * returning a partial tuple are treated as having no location at all.
 */
export const geoLocationSchema: z.ZodType<GeoLocation> = z.object({
  country: z.string().min(1).max(100),
  countryCode: z.string().min(1).max(10),
  region: z.string().min(1).max(100),
  city: z.string().min(1).max(100),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  timezone: optionalText(50),
});

export const newTelemetryRecordSchema: z.ZodType<NewTelemetryRecord> = z.object({
  endpoint: z.string().min(1).max(255),
  method: z.string().min(1).max(10).regex(/^[A-Z]+$/, 'HTTP method must be an upper-case token'),
  statusCode: z.number().int().min(100).max(599),
  responseTimeMs: z.number().finite().nonnegative(),
  userId: optionalText(64),
  ipAddress: optionalText(45),
  userAgent: z.string().max(500).optional(),
  requestSize: z.number().int().nonnegative().optional(),
  responseSize: z.number().int().nonnegative().optional(),
  geo: geoLocationSchema.optional(),
  errorMessage: z.string().max(1000).optional(),
  extraData: jsonRecordSchema.optional(),
});

// =============================================================================
// Reporting parameters
// =============================================================================

export const hoursSchema = z.coerce
  .number({ invalid_type_error: 'hours must be a number' })
  .int('hours must be an integer')
  .positive('hours must be greater than 0')
  .max(24 * 366, 'hours must not exceed one year');

export const limitSchema = (max: number) =>
  z.coerce
    .number({ invalid_type_error: 'limit must be a number' })
    .int('limit must be an integer')
    .positive('limit must be greater than 0')
    .max(max, `limit must not exceed ${max}`);

export const geographicParamsSchema = z.object({
  hours: hoursSchema.default(24),
});

export const cityParamsSchema = z.object({
  hours: hoursSchema.default(24),
  limit: limitSchema(1000).default(20),
});

export const windowParamsSchema = z.object({
  hours: hoursSchema.default(24),
});

export const timeSeriesParamsSchema = z.object({
  hours: hoursSchema.default(24),
  intervalMinutes: z.coerce
    .number({ invalid_type_error: 'interval_minutes must be a number' })
    .int('interval_minutes must be an integer')
    .positive('interval_minutes must be greater than 0')
    .max(24 * 60, 'interval_minutes must not exceed one day')
    .default(60),
});

export const recentErrorsParamsSchema = z.object({
  limit: limitSchema(1000).default(50),
});

export const slowRequestsParamsSchema = z.object({
  thresholdMs: z.coerce
    .number({ invalid_type_error: 'threshold_ms must be a number' })
    .nonnegative('threshold_ms must not be negative')
    .default(1000),
  limit: limitSchema(1000).default(50),
});

export const searchParamsSchema = z
  .object({
    endpoint: z.string().min(1).max(255).optional(),
    method: z
      .string()
      .min(1)
      .max(10)
      .transform((val) => val.toUpperCase())
      .optional(),
    statusCode: z.coerce.number().int().min(100).max(599).optional(),
    userId: z.string().min(1).max(64).optional(),
    minResponseTimeMs: z.coerce.number().nonnegative().optional(),
    maxResponseTimeMs: z.coerce.number().nonnegative().optional(),
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
    limit: limitSchema(1000).default(100),
    offset: z.coerce.number().int().nonnegative().default(0),
  })
  .refine(
    (val) => !val.startDate || !val.endDate || val.endDate.getTime() >= val.startDate.getTime(),
    { message: 'end_date must not be before start_date', path: ['endDate'] }
  );

export type SearchParams = z.input<typeof searchParamsSchema>;
