import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { AnalysisStatus } from '../../types';

/**
 * 📊 METRICS
 * Prometheus counters for the analyze endpoint, scraped from GET /metrics.
 */
export class Metrics {
    static readonly registry = new Registry();

    static readonly analyses = new Counter({
        name: 'analyze_requests_total',
        help: 'Analyze requests by outcome',
        labelNames: ['outcome'] as const,
        registers: [Metrics.registry],
    });

    static readonly oracleFailures = new Counter({
        name: 'oracle_failures_total',
        help: 'Candidates skipped because the entity oracle failed',
        registers: [Metrics.registry],
    });

    static readonly duration = new Histogram({
        name: 'analyze_duration_seconds',
        help: 'End-to-end analyze pipeline latency',
        buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
        registers: [Metrics.registry],
    });

    private static defaultsEnabled = false;

    static enableDefaultMetrics(): void {
        if (this.defaultsEnabled) return;
        collectDefaultMetrics({ register: this.registry });
        this.defaultsEnabled = true;
    }

    static record(outcome: AnalysisStatus | 'invalid_request' | 'internal_error', seconds?: number): void {
        this.analyses.inc({ outcome });
        if (seconds !== undefined) this.duration.observe(seconds);
    }
}
