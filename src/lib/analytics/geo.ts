import { logger } from '@/lib/logger';
import { geoLocationSchema } from './schemas';
import type { GeoLocation } from './types';

export interface GeoLookup {
  ipAddress?: string;
  headers: Headers;
}

/**
 * Maps a client to a location. Implementations may return a partial result;
 * callers pass it through `normalizeGeo`, which keeps all fields or none.
 */
export interface GeoResolver {
  resolve(lookup: GeoLookup): Promise<unknown>;
}

export function normalizeGeo(candidate: unknown): GeoLocation | null {
  if (candidate === null || candidate === undefined) return null;
  const parsed = geoLocationSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

interface GeoHeaderNames {
  countryCode: string;
  region: string;
  city: string;
  latitude: string;
  longitude: string;
  timezone: string;
}

const HEADER_SETS: GeoHeaderNames[] = [
  {
    countryCode: 'x-vercel-ip-country',
    region: 'x-vercel-ip-country-region',
    city: 'x-vercel-ip-city',
    latitude: 'x-vercel-ip-latitude',
    longitude: 'x-vercel-ip-longitude',
    timezone: 'x-vercel-ip-timezone',
  },
  {
    countryCode: 'cf-ipcountry',
    region: 'cf-region',
    city: 'cf-ipcity',
    latitude: 'cf-iplatitude',
    longitude: 'cf-iplongitude',
    timezone: 'cf-timezone',
  },
];

const regionNames = new Intl.DisplayNames(['en'], { type: 'region' });

export function countryName(countryCode: string): string {
  try {
    return regionNames.of(countryCode.toUpperCase()) ?? countryCode;
  } catch {
    return countryCode;
  }
}

function decodeHeader(value: string | null): string | undefined {
  if (!value) return undefined;
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function parseCoordinate(value: string | null): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Reads the location an edge proxy has already resolved (Vercel or
 * Cloudflare visitor-location headers). No network lookups.
 */
export class HeaderGeoResolver implements GeoResolver {
  async resolve({ headers }: GeoLookup): Promise<Partial<GeoLocation> | null> {
    for (const names of HEADER_SETS) {
      const countryCode = headers.get(names.countryCode)?.toUpperCase();
      // XX / T1 are the proxies' "unknown" and "Tor" markers
      if (!countryCode || countryCode === 'XX' || countryCode === 'T1') continue;

      return {
        country: countryName(countryCode),
        countryCode,
        region: decodeHeader(headers.get(names.region)),
        city: decodeHeader(headers.get(names.city)),
        latitude: parseCoordinate(headers.get(names.latitude)),
        longitude: parseCoordinate(headers.get(names.longitude)),
        timezone: decodeHeader(headers.get(names.timezone)),
      };
    }
    return null;
  }
}

interface CacheEntry {
  value: GeoLocation | null;
  expiresAt: number;
}

export interface CachedGeoResolverOptions {
  ttlMs?: number;
  maxEntries?: number;
  now?: () => number;
}

/**
 * Memoises normalised results per IP address. Lookups without an address go
 * straight to the inner resolver.
 */
export class CachedGeoResolver implements GeoResolver {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(
    private readonly inner: GeoResolver,
    options: CachedGeoResolverOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? 60 * 60 * 1000;
    this.maxEntries = options.maxEntries ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  async resolve(lookup: GeoLookup): Promise<GeoLocation | null> {
    const key = lookup.ipAddress;
    if (!key) {
      return normalizeGeo(await this.inner.resolve(lookup));
    }

    const cached = this.cache.get(key);
    if (cached && cached.expiresAt > this.now()) {
      // Refresh recency
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached.value;
    }

    const value = normalizeGeo(await this.inner.resolve(lookup));
    this.cache.delete(key);
    this.cache.set(key, { value, expiresAt: this.now() + this.ttlMs });

    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }

    return value;
  }

  size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
    logger.debug('Geolocation cache cleared');
  }
}
