import { describe, it, expect, beforeEach } from 'vitest';
import {
  computeCityStats,
  computeEndpointStats,
  computeGeographicStats,
  computeReport,
  computeSummary,
  computeTimeSeries,
  listRecentErrors,
  listSlowRequests,
  percentage,
  round2,
  searchRecords,
  windowForHours,
} from '../aggregation';
import { InMemoryTelemetryStore } from '../memory-store';
import {
  appendAt,
  cityGeo,
  DE_GEO,
  hoursAgo,
  minutesAgo,
  newRecord,
  NOW,
  TestClock,
  US_GEO,
} from './fixtures';

describe('helpers', () => {
  it('windowForHours should end at now and span the given hours', () => {
    expect(windowForHours(24, NOW)).toEqual({ since: hoursAgo(24), until: NOW });
  });

  it('percentage should round to two decimals and be 0 for an empty total', () => {
    expect(percentage(1, 3)).toBe(33.33);
    expect(percentage(2, 3)).toBe(66.67);
    expect(percentage(5, 0)).toBe(0);
    expect(round2(12.345678)).toBe(12.35);
  });
});

describe('aggregation engine', () => {
  let clock: TestClock;
  let store: InMemoryTelemetryStore;
  const window = windowForHours(24, NOW);

  beforeEach(() => {
    clock = new TestClock();
    store = new InMemoryTelemetryStore({ now: clock.now });
  });

  describe('computeGeographicStats', () => {
    beforeEach(async () => {
      const at = minutesAgo(30);
      await appendAt(store, clock, at, newRecord({ geo: US_GEO, statusCode: 200, responseTimeMs: 100, userId: 'u1' }));
      await appendAt(store, clock, at, newRecord({ geo: US_GEO, statusCode: 200, responseTimeMs: 200, userId: 'u1' }));
      await appendAt(store, clock, at, newRecord({ geo: US_GEO, statusCode: 500, responseTimeMs: 301, userId: 'u2' }));
      await appendAt(store, clock, at, newRecord({ geo: DE_GEO, statusCode: 200, responseTimeMs: 50 }));
      await appendAt(store, clock, at, newRecord({ geo: DE_GEO, statusCode: 404, responseTimeMs: 70 }));
    });

    it('should report US first with 33.33% errors, then DE with 50%', async () => {
      const stats = await computeGeographicStats(store, window);

      expect(stats).toEqual([
        {
          country: 'United States',
          countryCode: 'US',
          requestCount: 3,
          avgResponseTimeMs: 200.33,
          errorRatePercent: 33.33,
          uniqueUsers: 2,
        },
        {
          country: 'Germany',
          countryCode: 'DE',
          requestCount: 2,
          avgResponseTimeMs: 60,
          errorRatePercent: 50,
          uniqueUsers: 0,
        },
      ]);
    });

    it('should ignore records outside the window and without location', async () => {
      await appendAt(store, clock, hoursAgo(25), newRecord({ geo: DE_GEO }));
      await appendAt(store, clock, minutesAgo(5), newRecord());

      const stats = await computeGeographicStats(store, window);

      expect(stats.map((stat) => [stat.countryCode, stat.requestCount])).toEqual([
        ['US', 3],
        ['DE', 2],
      ]);
    });

    it('should return identical results on repeated calls', async () => {
      const first = await computeGeographicStats(store, window);
      const second = await computeGeographicStats(store, window);

      expect(second).toEqual(first);
    });

    it('should keep unique users within the request count', async () => {
      const stats = await computeGeographicStats(store, window);

      for (const stat of stats) {
        expect(stat.uniqueUsers).toBeLessThanOrEqual(stat.requestCount);
        expect(stat.errorRatePercent).toBeGreaterThanOrEqual(0);
        expect(stat.errorRatePercent).toBeLessThanOrEqual(100);
      }
    });
  });

  describe('computeCityStats', () => {
    beforeEach(async () => {
      for (let i = 0; i < 5; i++) {
        await appendAt(store, clock, minutesAgo(10 + i), newRecord({ geo: cityGeo('Paris', 48.85, 2.35) }));
      }
      for (let i = 0; i < 9; i++) {
        await appendAt(store, clock, minutesAgo(20 + i), newRecord({ geo: cityGeo('Lyon', 45.76, 4.84) }));
      }
    });

    it('should return only the busiest city when limited to one', async () => {
      const stats = await computeCityStats(store, window, 1);

      expect(stats).toEqual([
        {
          city: 'Lyon',
          region: 'Test Region',
          country: 'France',
          requestCount: 9,
          latitude: 45.76,
          longitude: 4.84,
        },
      ]);
    });

    it('should sort by request count and respect the limit', async () => {
      const stats = await computeCityStats(store, window, 20);

      expect(stats.map((stat) => [stat.city, stat.requestCount])).toEqual([
        ['Lyon', 9],
        ['Paris', 5],
      ]);
    });

    it('should keep one city with different coordinates as separate entries', async () => {
      await appendAt(store, clock, minutesAgo(1), newRecord({ geo: cityGeo('Paris', 48.86, 2.35) }));

      const stats = await computeCityStats(store, window, 20);

      expect(stats.map((stat) => [stat.city, stat.latitude, stat.requestCount])).toEqual([
        ['Lyon', 45.76, 9],
        ['Paris', 48.85, 5],
        ['Paris', 48.86, 1],
      ]);
    });
  });

  it('should return empty sequences for an empty window', async () => {
    await appendAt(store, clock, hoursAgo(30), newRecord({ geo: US_GEO }));

    expect(await computeGeographicStats(store, window)).toEqual([]);
    expect(await computeCityStats(store, window, 20)).toEqual([]);
  });

  describe('computeEndpointStats', () => {
    it('should derive latency bounds, rates and last call per endpoint and method', async () => {
      await appendAt(store, clock, minutesAgo(40), newRecord({ endpoint: '/api/a', statusCode: 200, responseTimeMs: 10 }));
      await appendAt(store, clock, minutesAgo(30), newRecord({ endpoint: '/api/a', statusCode: 201, responseTimeMs: 30 }));
      await appendAt(store, clock, minutesAgo(20), newRecord({ endpoint: '/api/a', statusCode: 302, responseTimeMs: 20 }));
      await appendAt(store, clock, minutesAgo(10), newRecord({ endpoint: '/api/a', statusCode: 503, responseTimeMs: 40 }));
      await appendAt(store, clock, minutesAgo(5), newRecord({ endpoint: '/api/a', method: 'POST' }));

      const stats = await computeEndpointStats(store, window);

      expect(stats[0]).toEqual({
        endpoint: '/api/a',
        method: 'GET',
        totalCalls: 4,
        avgResponseTimeMs: 25,
        minResponseTimeMs: 10,
        maxResponseTimeMs: 40,
        successRatePercent: 50,
        errorRatePercent: 25,
        lastCalledAt: minutesAgo(10),
      });
      expect(stats[1]).toMatchObject({ endpoint: '/api/a', method: 'POST', totalCalls: 1 });
    });
  });

  describe('computeSummary', () => {
    it('should total requests and build distributions', async () => {
      await store.append(newRecord({ endpoint: '/fast', responseTimeMs: 10 }));
      await store.append(newRecord({ endpoint: '/fast', responseTimeMs: 20 }));
      await store.append(newRecord({ endpoint: '/slow', method: 'POST', statusCode: 500, responseTimeMs: 900 }));
      await store.append(newRecord({ endpoint: '/slow', statusCode: 404, responseTimeMs: 70 }));

      const summary = await computeSummary(store, windowForHours(2, new Date(NOW.getTime() + 1)), 2);

      expect(summary).toEqual({
        totalRequests: 4,
        totalEndpoints: 2,
        avgResponseTimeMs: 250,
        totalErrors: 2,
        errorRatePercent: 50,
        requestsPerHour: 2,
        mostCalledEndpoints: [
          { endpoint: '/fast', method: 'GET', count: 2 },
          { endpoint: '/slow', method: 'GET', count: 1 },
          { endpoint: '/slow', method: 'POST', count: 1 },
        ],
        slowestEndpoints: [
          { endpoint: '/slow', method: 'POST', avgResponseTimeMs: 900 },
          { endpoint: '/slow', method: 'GET', avgResponseTimeMs: 70 },
          { endpoint: '/fast', method: 'GET', avgResponseTimeMs: 15 },
        ],
        statusCodeDistribution: { '200': 2, '404': 1, '500': 1 },
        methodDistribution: { GET: 3, POST: 1 },
      });
    });

    it('should report zeros for an empty window', async () => {
      const summary = await computeSummary(store, window, 24);

      expect(summary).toMatchObject({
        totalRequests: 0,
        totalEndpoints: 0,
        avgResponseTimeMs: 0,
        totalErrors: 0,
        errorRatePercent: 0,
        requestsPerHour: 0,
        mostCalledEndpoints: [],
      });
    });
  });

  describe('computeTimeSeries', () => {
    it('should emit every interval, with zeros where there was no traffic', async () => {
      const threeHours = windowForHours(3, NOW);
      await appendAt(store, clock, minutesAgo(170), newRecord({ responseTimeMs: 100 }));
      await appendAt(store, clock, minutesAgo(110), newRecord({ responseTimeMs: 100 }));
      await appendAt(store, clock, minutesAgo(100), newRecord({ responseTimeMs: 201 }));

      const points = await computeTimeSeries(store, threeHours, 60);

      expect(points).toEqual([
        { timestamp: hoursAgo(3), count: 1, avgResponseTimeMs: 100 },
        { timestamp: hoursAgo(2), count: 2, avgResponseTimeMs: 150.5 },
        { timestamp: hoursAgo(1), count: 0, avgResponseTimeMs: 0 },
      ]);
    });
  });

  describe('raw record listings', () => {
    beforeEach(async () => {
      await appendAt(store, clock, minutesAgo(30), newRecord({ endpoint: '/api/users', statusCode: 500, responseTimeMs: 1500 }));
      await appendAt(store, clock, minutesAgo(20), newRecord({ endpoint: '/api/courses', statusCode: 200, responseTimeMs: 2500 }));
      await appendAt(store, clock, minutesAgo(10), newRecord({ endpoint: '/api/courses/1', statusCode: 404, responseTimeMs: 40 }));
    });

    it('listRecentErrors should return errors newest first', async () => {
      const records = await listRecentErrors(store, 10);

      expect(records.map((record) => record.statusCode)).toEqual([404, 500]);
    });

    it('listSlowRequests should return requests over the threshold, slowest first', async () => {
      const records = await listSlowRequests(store, 1000, 10);

      expect(records.map((record) => record.responseTimeMs)).toEqual([2500, 1500]);
    });

    it('searchRecords should match endpoint substrings and treat end date as inclusive', async () => {
      const records = await searchRecords(store, {
        endpoint: 'courses',
        startDate: minutesAgo(20),
        endDate: minutesAgo(10),
        limit: 100,
        offset: 0,
      });

      expect(records.map((record) => record.endpoint)).toEqual(['/api/courses/1', '/api/courses']);
    });
  });

  it('computeReport should combine summary, endpoints, series and errors', async () => {
    await appendAt(store, clock, minutesAgo(30), newRecord({ statusCode: 500 }));

    const report = await computeReport(store, window, 24);

    expect(report.summary.totalRequests).toBe(1);
    expect(report.endpointStats).toHaveLength(1);
    expect(report.timeSeries).toHaveLength(24);
    expect(report.timeSeries[23].count).toBe(1);
    expect(report.recentErrors).toHaveLength(1);
  });
});
