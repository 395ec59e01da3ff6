/**
 * METRICS COLLECTION
 *
 * Lightweight in-process metrics for the prefix lookup service.
 * Exposes a Prometheus-compatible /metrics endpoint.
 *
 * Collected metrics:
 * - WHOIS query latency histogram
 * - Sessions opened and AS numbers fetched from the registry
 * - Cache hits/misses/expiries
 * - Errors by kind
 * - HTTP request latency and concurrency
 */

import { Router, Request, Response, NextFunction } from 'express';

// Histogram bucket boundaries (milliseconds)
const LATENCY_BUCKETS = [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

const PREFIX = 'asn_netblocks';

interface HistogramData {
  buckets: Map<number, number>;
  sum: number;
  count: number;
}

interface HistogramSummary {
  count: number;
  sum_ms: number;
  avg_ms: number;
}

export interface MetricsSnapshot {
  whois: {
    sessions: number;
    fetches: number;
    as_numbers_fetched: number;
    query_latency: HistogramSummary;
  };
  cache: {
    hits: number;
    misses: number;
    expired: number;
    hit_rate: number;
  };
  errors_by_kind: Record<string, number>;
  requests: {
    latency: HistogramSummary;
    current: number;
    peak: number;
  };
}

/**
 * Metrics collector singleton
 */
class MetricsCollector {
  // Histograms
  private whoisQueryLatency: HistogramData;
  private requestLatency: HistogramData;

  // Counters
  private whoisSessions = 0;
  private whoisFetches = 0;
  private asNumbersFetched = 0;
  private cacheHits = 0;
  private cacheMisses = 0;
  private cacheExpired = 0;
  private errorsByKind: Map<string, number> = new Map();

  // Gauges
  private activeRequests = 0;
  private peakRequests = 0;

  constructor() {
    this.whoisQueryLatency = this.createHistogram();
    this.requestLatency = this.createHistogram();
  }

  private createHistogram(): HistogramData {
    const buckets = new Map<number, number>();
    LATENCY_BUCKETS.forEach(b => buckets.set(b, 0));
    buckets.set(Infinity, 0);
    return { buckets, sum: 0, count: 0 };
  }

  private recordHistogram(histogram: HistogramData, value: number): void {
    histogram.sum += value;
    histogram.count += 1;

    // only the first matching bucket; formatHistogram accumulates
    const bucket = LATENCY_BUCKETS.find(b => value <= b) ?? Infinity;
    histogram.buckets.set(bucket, (histogram.buckets.get(bucket) || 0) + 1);
  }

  private summarize(histogram: HistogramData): HistogramSummary {
    return {
      count: histogram.count,
      sum_ms: histogram.sum,
      avg_ms: histogram.count > 0 ? Math.round(histogram.sum / histogram.count) : 0
    };
  }

  // WHOIS metrics
  recordWhoisQueryLatency(ms: number): void {
    this.recordHistogram(this.whoisQueryLatency, ms);
  }

  incrementWhoisSessions(): void {
    this.whoisSessions++;
  }

  incrementWhoisFetch(asCount: number): void {
    this.whoisFetches++;
    this.asNumbersFetched += asCount;
  }

  incrementError(kind: string): void {
    this.errorsByKind.set(kind, (this.errorsByKind.get(kind) || 0) + 1);
  }

  // Cache metrics
  incrementCacheHit(): void {
    this.cacheHits++;
  }

  incrementCacheMiss(): void {
    this.cacheMisses++;
  }

  incrementCacheExpired(): void {
    this.cacheExpired++;
  }

  getCacheHitRate(): number {
    const total = this.cacheHits + this.cacheMisses;
    return total > 0 ? this.cacheHits / total : 0;
  }

  // Request metrics
  recordRequestLatency(ms: number): void {
    this.recordHistogram(this.requestLatency, ms);
  }

  incrementConcurrentRequests(): void {
    this.activeRequests++;
    if (this.activeRequests > this.peakRequests) {
      this.peakRequests = this.activeRequests;
    }
  }

  decrementConcurrentRequests(): void {
    this.activeRequests = Math.max(0, this.activeRequests - 1);
  }

  // Format histogram for Prometheus
  private formatHistogram(name: string, histogram: HistogramData, help: string): string {
    const lines: string[] = [];
    lines.push(`# HELP ${name} ${help}`);
    lines.push(`# TYPE ${name} histogram`);

    let cumulative = 0;
    for (const bucket of LATENCY_BUCKETS) {
      cumulative += histogram.buckets.get(bucket) || 0;
      lines.push(`${name}_bucket{le="${bucket}"} ${cumulative}`);
    }
    lines.push(`${name}_bucket{le="+Inf"} ${histogram.count}`);
    lines.push(`${name}_sum ${histogram.sum}`);
    lines.push(`${name}_count ${histogram.count}`);

    return lines.join('\n');
  }

  private formatScalar(name: string, type: 'counter' | 'gauge', help: string, value: number | string): string {
    return [
      `# HELP ${name} ${help}`,
      `# TYPE ${name} ${type}`,
      `${name} ${value}`
    ].join('\n');
  }

  // Generate Prometheus-compatible metrics output
  toPrometheus(): string {
    const sections: string[] = [];

    sections.push(this.formatHistogram(
      `${PREFIX}_whois_query_latency_ms`,
      this.whoisQueryLatency,
      'Latency of a single WHOIS prefix query in milliseconds'
    ));
    sections.push(this.formatScalar(`${PREFIX}_whois_sessions_total`, 'counter', 'WHOIS sessions opened', this.whoisSessions));
    sections.push(this.formatScalar(`${PREFIX}_whois_fetches_total`, 'counter', 'Batches sent to the WHOIS registry', this.whoisFetches));
    sections.push(this.formatScalar(`${PREFIX}_whois_as_numbers_total`, 'counter', 'AS numbers requested from the WHOIS registry', this.asNumbersFetched));

    sections.push(this.formatScalar(`${PREFIX}_cache_hits_total`, 'counter', 'Total cache hits', this.cacheHits));
    sections.push(this.formatScalar(`${PREFIX}_cache_misses_total`, 'counter', 'Total cache misses', this.cacheMisses));
    sections.push(this.formatScalar(`${PREFIX}_cache_expired_total`, 'counter', 'Cache records dropped after their ttl', this.cacheExpired));
    sections.push(this.formatScalar(`${PREFIX}_cache_hit_rate`, 'gauge', 'Cache hit rate (0-1)', this.getCacheHitRate().toFixed(4)));

    const errorLines = [
      `# HELP ${PREFIX}_errors_total Errors by kind`,
      `# TYPE ${PREFIX}_errors_total counter`
    ];
    for (const [kind, count] of this.errorsByKind) {
      errorLines.push(`${PREFIX}_errors_total{kind="${kind}"} ${count}`);
    }
    sections.push(errorLines.join('\n'));

    sections.push(this.formatHistogram(
      `${PREFIX}_request_latency_ms`,
      this.requestLatency,
      'HTTP request latency in milliseconds'
    ));
    sections.push(this.formatScalar(`${PREFIX}_concurrent_requests`, 'gauge', 'Current concurrent requests', this.activeRequests));
    sections.push(this.formatScalar(`${PREFIX}_peak_concurrent_requests`, 'gauge', 'Peak concurrent requests', this.peakRequests));

    return sections.join('\n\n') + '\n';
  }

  // Get summary for JSON endpoint
  toJSON(): MetricsSnapshot {
    return {
      whois: {
        sessions: this.whoisSessions,
        fetches: this.whoisFetches,
        as_numbers_fetched: this.asNumbersFetched,
        query_latency: this.summarize(this.whoisQueryLatency)
      },
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        expired: this.cacheExpired,
        hit_rate: this.getCacheHitRate()
      },
      errors_by_kind: Object.fromEntries(this.errorsByKind),
      requests: {
        latency: this.summarize(this.requestLatency),
        current: this.activeRequests,
        peak: this.peakRequests
      }
    };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.whoisQueryLatency = this.createHistogram();
    this.requestLatency = this.createHistogram();
    this.whoisSessions = 0;
    this.whoisFetches = 0;
    this.asNumbersFetched = 0;
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.cacheExpired = 0;
    this.errorsByKind.clear();
    this.activeRequests = 0;
    this.peakRequests = 0;
  }
}

// Singleton instance
export const metrics = new MetricsCollector();

/**
 * Create metrics router
 */
export function createMetricsRouter(): Router {
  const router = Router();

  // Prometheus-compatible metrics endpoint
  router.get('/metrics', (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metrics.toPrometheus());
  });

  // JSON metrics endpoint
  router.get('/metrics/json', (_req: Request, res: Response) => {
    res.json(metrics.toJSON());
  });

  return router;
}

/**
 * Middleware to track request metrics
 */
export function metricsMiddleware() {
  return (_req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    metrics.incrementConcurrentRequests();

    res.on('finish', () => {
      metrics.decrementConcurrentRequests();
      metrics.recordRequestLatency(Date.now() - startTime);
    });

    next();
  };
}
