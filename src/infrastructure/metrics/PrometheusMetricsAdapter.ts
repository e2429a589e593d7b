import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { IMetricsPort, MetricTags } from '../../domain/ports/IMetricsPort';

export interface PrometheusMetricsOptions {
    prefix?: string;
    /** Collect Node.js process metrics too (default: true) */
    collectDefaults?: boolean;
}

/**
 * Implements IMetricsPort using prom-client. Scraped from GET /metrics.
 */
export class PrometheusMetricsAdapter implements IMetricsPort {
    private readonly registry: Registry;
    private readonly prefix: string;
    private counters: Map<string, Counter<string>> = new Map();
    private histograms: Map<string, Histogram<string>> = new Map();
    private gauges: Map<string, Gauge<string>> = new Map();

    constructor(options?: PrometheusMetricsOptions) {
        this.prefix = options?.prefix ?? 'live_intel_';
        this.registry = new Registry();
        this.registry.setDefaultLabels({ app: 'live-intelligence-pipeline' });

        if (options?.collectDefaults ?? true) {
            collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
        }
    }

    incrementCounter(name: string, tags?: MetricTags, value: number = 1): void {
        const metricName = this.sanitizeName(name);
        let counter = this.counters.get(metricName);

        if (!counter) {
            counter = new Counter({
                name: metricName,
                help: `Total count of ${name}`,
                labelNames: tags ? Object.keys(tags) : [],
                registers: [this.registry],
            });
            this.counters.set(metricName, counter);
        }

        if (tags) {
            counter.inc(this.stringifyTags(tags), value);
        } else {
            counter.inc(value);
        }
    }

    recordDuration(name: string, durationMs: number, tags?: MetricTags): void {
        const metricName = this.sanitizeName(name);
        let histogram = this.histograms.get(metricName);

        if (!histogram) {
            histogram = new Histogram({
                name: metricName,
                help: `Distribution of ${name}`,
                labelNames: tags ? Object.keys(tags) : [],
                buckets: [10, 50, 100, 500, 1000, 5000, 15000, 60000],
                registers: [this.registry],
            });
            this.histograms.set(metricName, histogram);
        }

        if (tags) {
            histogram.observe(this.stringifyTags(tags), durationMs);
        } else {
            histogram.observe(durationMs);
        }
    }

    recordGauge(name: string, value: number, tags?: MetricTags): void {
        const metricName = this.sanitizeName(name);
        let gauge = this.gauges.get(metricName);

        if (!gauge) {
            gauge = new Gauge({
                name: metricName,
                help: `Current value of ${name}`,
                labelNames: tags ? Object.keys(tags) : [],
                registers: [this.registry],
            });
            this.gauges.set(metricName, gauge);
        }

        if (tags) {
            gauge.set(this.stringifyTags(tags), value);
        } else {
            gauge.set(value);
        }
    }

    startTimer(name: string, tags?: MetricTags): () => void {
        const startTime = Date.now();
        return () => {
            this.recordDuration(name, Date.now() - startTime, tags);
        };
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    /**
     * Prometheus text exposition of every registered metric.
     */
    async getMetrics(): Promise<string> {
        return this.registry.metrics();
    }

    /**
     * Prometheus names allow [a-zA-Z0-9_:] only.
     */
    private sanitizeName(name: string): string {
        return `${this.prefix}${name.replace(/[^a-zA-Z0-9_:]/g, '_')}`;
    }

    private stringifyTags(tags: MetricTags): Record<string, string> {
        const result: Record<string, string> = {};
        for (const [key, value] of Object.entries(tags)) {
            result[key] = String(value);
        }
        return result;
    }
}
