/**
 * Metrics Module
 *
 * Lightweight instrumentation for monitoring redirect performance.
 * Prometheus-compatible output format.
 *
 * Design Decisions:
 * - In-memory counters (no external dependencies)
 * - Lock-free increments (single-threaded Node.js)
 * - Histogram approximation using fixed buckets
 */

// =============================================================================
// Configuration
// =============================================================================

/**
 * Histogram buckets for latency measurements (in milliseconds)
 */
const LATENCY_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000];

const PREFIX = "linkpulse";

// =============================================================================
// State
// =============================================================================

const zeroCounters = () => ({
  // Redirects by status code
  redirect_302: 0,
  redirect_404: 0,
  redirect_503: 0,

  // Cache metrics (successful redirects only)
  cache_hit: 0,
  cache_miss: 0,

  // Write path
  links_created: 0,
  rate_limited: 0,

  // Any request answered 503 because the durable store failed
  store_unavailable: 0,
});

const counters = zeroCounters();

export type CounterName = keyof typeof counters;

const latencyHistogram = {
  buckets: new Array<number>(LATENCY_BUCKETS.length + 1).fill(0),
  sum: 0,
  count: 0,
};

// =============================================================================
// Public API
// =============================================================================

export function increment(name: CounterName): void {
  counters[name]++;
}

/**
 * Record a redirect latency observation.
 */
export function recordLatency(latencyMs: number): void {
  latencyHistogram.sum += latencyMs;
  latencyHistogram.count++;

  for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
    if (latencyMs <= LATENCY_BUCKETS[i]) {
      latencyHistogram.buckets[i]++;
      return;
    }
  }
  // +Inf bucket
  latencyHistogram.buckets[LATENCY_BUCKETS.length]++;
}

/**
 * Record redirect result (convenience method).
 *
 * @param source - where a successful lookup was served from
 */
export function recordRedirect(
  statusCode: 302 | 404 | 503,
  source: "cache" | "store" | null,
  latencyMs: number
): void {
  switch (statusCode) {
    case 302:
      counters.redirect_302++;
      break;
    case 404:
      counters.redirect_404++;
      break;
    case 503:
      counters.redirect_503++;
      counters.store_unavailable++;
      break;
  }

  if (source === "cache") counters.cache_hit++;
  if (source === "store") counters.cache_miss++;

  recordLatency(latencyMs);
}

/**
 * Get current metrics in Prometheus text format.
 */
export function getMetrics(): string {
  const lines: string[] = [];

  const addCounter = (name: string, value: number, help: string) => {
    lines.push(`# HELP ${PREFIX}_${name} ${help}`);
    lines.push(`# TYPE ${PREFIX}_${name} counter`);
    lines.push(`${PREFIX}_${name} ${value}`);
  };

  // Redirect counters
  lines.push(`# HELP ${PREFIX}_redirect_total Total redirects by status`);
  lines.push(`# TYPE ${PREFIX}_redirect_total counter`);
  lines.push(`${PREFIX}_redirect_total{status="302"} ${counters.redirect_302}`);
  lines.push(`${PREFIX}_redirect_total{status="404"} ${counters.redirect_404}`);
  lines.push(`${PREFIX}_redirect_total{status="503"} ${counters.redirect_503}`);

  addCounter("cache_hit_total", counters.cache_hit, "Redirects served from cache");
  addCounter("cache_miss_total", counters.cache_miss, "Redirects served from the database");
  addCounter("links_created_total", counters.links_created, "Links registered");
  addCounter("rate_limited_total", counters.rate_limited, "Requests rejected by the rate limiter");
  addCounter("store_unavailable_total", counters.store_unavailable, "Requests failed by database errors");

  // Latency histogram
  lines.push(`# HELP ${PREFIX}_redirect_latency_ms Redirect latency in milliseconds`);
  lines.push(`# TYPE ${PREFIX}_redirect_latency_ms histogram`);

  let cumulative = 0;
  for (let i = 0; i < LATENCY_BUCKETS.length; i++) {
    cumulative += latencyHistogram.buckets[i];
    lines.push(`${PREFIX}_redirect_latency_ms_bucket{le="${LATENCY_BUCKETS[i]}"} ${cumulative}`);
  }
  cumulative += latencyHistogram.buckets[LATENCY_BUCKETS.length];
  lines.push(`${PREFIX}_redirect_latency_ms_bucket{le="+Inf"} ${cumulative}`);
  lines.push(`${PREFIX}_redirect_latency_ms_sum ${latencyHistogram.sum}`);
  lines.push(`${PREFIX}_redirect_latency_ms_count ${latencyHistogram.count}`);

  return lines.join("\n");
}

/**
 * Current counter values (for tests and debugging).
 */
export function getCounters(): Readonly<Record<CounterName, number>> {
  return { ...counters };
}

/**
 * Reset all metrics (for testing).
 */
export function reset(): void {
  Object.assign(counters, zeroCounters());
  latencyHistogram.buckets.fill(0);
  latencyHistogram.sum = 0;
  latencyHistogram.count = 0;
}
