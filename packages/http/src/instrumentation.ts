export interface RequestMetric {
  durationMs: number;
  endpoint: string; // Path only, sanitized
  error?: string | undefined;
  host: string;
  method: string;
  /** 0 when no response was received */
  status: number;
  timestamp: number;
}

export interface MetricsSummary {
  avgDuration: number;
  byEndpoint: Record<string, EndpointMetrics>;
  byHost: Record<string, number>;
  failed: number;
  successful: number;
  successRate: number;
  total: number;
}

export interface EndpointMetrics {
  avgDuration: number;
  calls: number;
  errors: number;
}

const isSuccessful = (metric: RequestMetric): boolean =>
  metric.error === undefined && metric.status >= 200 && metric.status < 400;

/**
 * In-memory record of physical request attempts.
 * Keeps the most recent `maxMetrics` entries; older ones are dropped.
 */
export class InstrumentationCollector {
  private metrics: RequestMetric[] = [];

  constructor(private readonly maxMetrics = 10_000) {
    if (!Number.isInteger(maxMetrics) || maxMetrics < 1) {
      throw new Error(`Invalid instrumentation configuration: maxMetrics must be a positive integer, got ${maxMetrics}`);
    }
  }

  record(metric: RequestMetric): void {
    this.metrics.push(metric);
    if (this.metrics.length > this.maxMetrics) {
      this.metrics.splice(0, this.metrics.length - this.maxMetrics);
    }
  }

  getMetrics(): readonly RequestMetric[] {
    return this.metrics;
  }

  reset(): void {
    this.metrics = [];
  }

  getSummary(): MetricsSummary {
    if (this.metrics.length === 0) {
      return {
        avgDuration: 0,
        byEndpoint: {},
        byHost: {},
        failed: 0,
        successful: 0,
        successRate: 0,
        total: 0,
      };
    }

    const byHost: Record<string, number> = {};
    const byEndpoint: Record<string, EndpointMetrics> = {};
    let successful = 0;
    let totalDuration = 0;

    for (const m of this.metrics) {
      byHost[m.host] = (byHost[m.host] ?? 0) + 1;

      const key = `${m.method} ${m.host}${m.endpoint}`;
      const current = byEndpoint[key] ?? { avgDuration: 0, calls: 0, errors: 0 };
      const endpointDuration = current.avgDuration * current.calls + m.durationMs;
      current.calls += 1;
      current.avgDuration = endpointDuration / current.calls;
      if (!isSuccessful(m)) {
        current.errors += 1;
      }
      byEndpoint[key] = current;

      if (isSuccessful(m)) {
        successful += 1;
      }
      totalDuration += m.durationMs;
    }

    const total = this.metrics.length;
    return {
      avgDuration: totalDuration / total,
      byEndpoint,
      byHost,
      failed: total - successful,
      successful,
      successRate: successful / total,
      total,
    };
  }
}

/**
 * Reduces an endpoint to its path and masks segments that look like keys or tokens
 */
export function sanitizeEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint, 'http://placeholder.invalid');

    return url.pathname
      .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, '/{id}') // UUIDs
      .replace(/\/[a-f0-9]{32,}/gi, '/{apiKey}') // Hex API keys
      .replace(/\/[A-Za-z0-9_-]{20,}/g, '/{apiKey}'); // Base64-like keys
  } catch {
    return endpoint;
  }
}
