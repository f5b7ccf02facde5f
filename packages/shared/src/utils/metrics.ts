/**
 * Prometheus Metrics Helpers
 * Counters, gauges and histograms rendered in the text exposition format
 */

type Labels = Record<string, string>;

interface CounterMetric {
    type: 'counter';
    name: string;
    help: string;
    labels: string[];
    values: Map<string, number>;
}

interface GaugeMetric {
    type: 'gauge';
    name: string;
    help: string;
    labels: string[];
    values: Map<string, number>;
}

interface HistogramMetric {
    type: 'histogram';
    name: string;
    help: string;
    labels: string[];
    buckets: number[];
    /** bucket counts are cumulative: index i holds observations <= buckets[i] */
    observations: Map<string, { count: number; sum: number; buckets: number[] }>;
}

type Metric = CounterMetric | GaugeMetric | HistogramMetric;

function labelsToString(labels: Labels): string {
    return Object.entries(labels)
        .map(([k, v]) => `${k}="${v}"`)
        .join(',');
}

// ============================================
// Registry
// ============================================

export class MetricsRegistry {
    private readonly entries: Map<string, Metric> = new Map();

    createCounter(name: string, help: string, labels: string[] = []): Counter {
        const metric: CounterMetric = { type: 'counter', name, help, labels, values: new Map() };
        this.entries.set(name, metric);
        return new Counter(metric);
    }

    createGauge(name: string, help: string, labels: string[] = []): Gauge {
        const metric: GaugeMetric = { type: 'gauge', name, help, labels, values: new Map() };
        this.entries.set(name, metric);
        return new Gauge(metric);
    }

    createHistogram(
        name: string,
        help: string,
        labels: string[] = [],
        buckets: number[] = [1, 2, 5, 10, 25, 50, 100, 250, 500]
    ): Histogram {
        const metric: HistogramMetric = {
            type: 'histogram',
            name,
            help,
            labels,
            buckets,
            observations: new Map(),
        };
        this.entries.set(name, metric);
        return new Histogram(metric);
    }

    /** Prometheus text format */
    render(): string {
        const lines: string[] = [];

        for (const metric of this.entries.values()) {
            lines.push(`# HELP ${metric.name} ${metric.help}`);
            lines.push(`# TYPE ${metric.name} ${metric.type}`);

            if (metric.type === 'histogram') {
                for (const [labelStr, obs] of metric.observations) {
                    const labelPrefix = labelStr ? `${labelStr},` : '';
                    metric.buckets.forEach((le, i) => {
                        lines.push(`${metric.name}_bucket{${labelPrefix}le="${le}"} ${obs.buckets[i] ?? 0}`);
                    });
                    lines.push(`${metric.name}_bucket{${labelPrefix}le="+Inf"} ${obs.count}`);
                    const suffix = labelStr ? `{${labelStr}}` : '';
                    lines.push(`${metric.name}_sum${suffix} ${obs.sum}`);
                    lines.push(`${metric.name}_count${suffix} ${obs.count}`);
                }
            } else {
                for (const [labelStr, value] of metric.values) {
                    const labels = labelStr ? `{${labelStr}}` : '';
                    lines.push(`${metric.name}${labels} ${value}`);
                }
            }
        }

        return lines.join('\n') + '\n';
    }

    reset(): void {
        for (const metric of this.entries.values()) {
            if (metric.type === 'histogram') {
                metric.observations.clear();
            } else {
                metric.values.clear();
            }
        }
    }
}

// ============================================
// Metric Classes
// ============================================

export class Counter {
    constructor(private metric: CounterMetric) { }

    inc(labels: Labels = {}, value = 1): void {
        const key = labelsToString(labels);
        this.metric.values.set(key, (this.metric.values.get(key) ?? 0) + value);
    }

    get(labels: Labels = {}): number {
        return this.metric.values.get(labelsToString(labels)) ?? 0;
    }
}

export class Gauge {
    constructor(private metric: GaugeMetric) { }

    set(value: number, labels: Labels = {}): void {
        this.metric.values.set(labelsToString(labels), value);
    }

    inc(labels: Labels = {}, value = 1): void {
        const key = labelsToString(labels);
        this.metric.values.set(key, (this.metric.values.get(key) ?? 0) + value);
    }

    dec(labels: Labels = {}, value = 1): void {
        this.inc(labels, -value);
    }

    get(labels: Labels = {}): number {
        return this.metric.values.get(labelsToString(labels)) ?? 0;
    }
}

export class Histogram {
    constructor(private metric: HistogramMetric) { }

    observe(value: number, labels: Labels = {}): void {
        const key = labelsToString(labels);

        const obs = this.metric.observations.get(key)
            ?? { count: 0, sum: 0, buckets: this.metric.buckets.map(() => 0) };
        this.metric.observations.set(key, obs);

        obs.count++;
        obs.sum += value;

        this.metric.buckets.forEach((le, i) => {
            if (value <= le) {
                obs.buckets[i] = (obs.buckets[i] ?? 0) + 1;
            }
        });
    }

    startTimer(labels: Labels = {}): () => number {
        const start = performance.now();
        return () => {
            const duration = performance.now() - start;
            this.observe(duration, labels);
            return duration;
        };
    }
}
