/**
 * Prometheus metrics for the headline tagger
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================================================
// FEED METRICS
// ============================================================================

/**
 * Counter: Feed fetches by outcome
 */
export const feedFetchesTotal = new client.Counter({
    name: 'headline_tagger_feed_fetches_total',
    help: 'Total feed fetches by outcome',
    labelNames: ['outcome'] as const,
    registers: [registry],
});

/**
 * Histogram: Feed fetch duration in seconds
 */
export const feedFetchDuration = new client.Histogram({
    name: 'headline_tagger_feed_fetch_duration_seconds',
    help: 'Feed fetch and parse duration in seconds',
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10],
    registers: [registry],
});

// ============================================================================
// GENERATION METRICS
// ============================================================================

/**
 * Counter: Generation API calls by outcome
 */
export const generationCallsTotal = new client.Counter({
    name: 'headline_tagger_generation_calls_total',
    help: 'Total generation API calls by outcome',
    labelNames: ['outcome'] as const,
    registers: [registry],
});

/**
 * Histogram: Generation API latency
 */
export const generationLatency = new client.Histogram({
    name: 'headline_tagger_generation_latency_seconds',
    help: 'Generation API latency in seconds',
    buckets: [0.5, 1, 2, 5, 10, 20, 30],
    registers: [registry],
});

// ============================================================================
// TAG CACHE METRICS
// ============================================================================

/**
 * Counter: Tag cache lookups by result
 */
export const tagCacheLookups = new client.Counter({
    name: 'headline_tagger_tag_cache_lookups_total',
    help: 'Tag cache lookups during annotation',
    labelNames: ['result'] as const,
    registers: [registry],
});

/**
 * Gauge: Tag cache entries
 */
export const tagCacheSize = new client.Gauge({
    name: 'headline_tagger_tag_cache_entries',
    help: 'Number of links with cached tags',
    registers: [registry],
});

// ============================================================================
// CIRCUIT BREAKER METRICS
// ============================================================================

/**
 * Gauge: Circuit breaker state (0 = closed, 1 = open, 2 = half-open)
 */
export const circuitState = new client.Gauge({
    name: 'headline_tagger_circuit_state',
    help: 'Circuit breaker state (0=closed, 1=open, 2=half-open)',
    labelNames: ['dependency'] as const,
    registers: [registry],
});

/**
 * Counter: Circuit breaker trips (open events)
 */
export const circuitTrips = new client.Counter({
    name: 'headline_tagger_circuit_trips_total',
    help: 'Number of times circuit breaker opened',
    labelNames: ['dependency'] as const,
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get metrics as Prometheus text format
 */
export async function getMetrics(): Promise<string> {
    return registry.metrics();
}

/**
 * Get content type for Prometheus
 */
export function getContentType(): string {
    return registry.contentType;
}
