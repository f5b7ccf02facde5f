/**
 * Production Metrics
 *
 * Metric set shared by the HTTP services. The predictor adds its
 * edge-signal counters on top of the request/latency basics.
 */

import { MetricsRegistry } from './metrics';

export function createProductionMetrics(serviceName: string) {
    const registry = new MetricsRegistry();
    const prefix = serviceName.replace(/-/g, '_');

    return {
        registry,

        // ============================================
        // Request Metrics
        // ============================================

        requests: registry.createCounter(
            `${prefix}_requests_total`,
            'Total requests',
            ['method', 'path', 'status']
        ),

        errors: registry.createCounter(
            `${prefix}_errors_total`,
            'Total errors',
            ['type']
        ),

        requestLatency: registry.createHistogram(
            `${prefix}_request_latency_ms`,
            'Request latency (ms)',
            ['method', 'path'],
            [1, 5, 10, 25, 50, 100, 250, 500]
        ),

        // ============================================
        // Probability Pipeline
        // ============================================

        /** Time spent inside the engine for one update */
        predictorLatency: registry.createHistogram(
            'predictor_latency_ms',
            'Probability update latency (ms)',
            ['path'],
            [0.1, 0.25, 0.5, 1, 2, 5, 10, 25]
        ),

        /** Per-stage latency breakdown (update, series, publish) */
        stageLatency: registry.createHistogram(
            'stage_latency_ms',
            'Latency per processing stage (ms)',
            ['stage'],
            [0.5, 1, 5, 10, 25, 50, 100]
        ),

        eventsProcessed: registry.createCounter(
            `${prefix}_events_processed_total`,
            'Game events applied to an engine',
            ['title', 'type']
        ),

        /** Events that fell back to the unknown-event impact */
        eventAnomalies: registry.createCounter(
            `${prefix}_event_anomalies_total`,
            'Events resolved through a fallback impact',
            ['resolution']
        ),

        edgeSignals: registry.createCounter(
            'edge_signals_total',
            'Edge evaluations by recommended action',
            ['action']
        ),

        activeMatches: registry.createGauge(
            'active_matches',
            'Matches with a live session'
        ),

        /** Record stage timing */
        recordStage(stage: string, latencyMs: number) {
            this.stageLatency.observe(latencyMs, { stage });
        },
    };
}

export type ProductionMetrics = ReturnType<typeof createProductionMetrics>;
