import path from 'path';
import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config, fetchBudgetMs } from '../config';
import { PipelineOrchestrator } from '../application/PipelineOrchestrator';
import { BackgroundTaskRegistry } from '../application/BackgroundTaskRegistry';
import { ResilientExecutor } from '../application/services/ResilientExecutor';
import { DashboardResult, isDashboardResult } from '../domain/entities/CompanyIntel';
import { ICacheStore } from '../domain/ports/ICacheStore';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';

// Infrastructure imports
import { RateLimiter } from '../infrastructure/resilience/RateLimiter';
import { BreakerStatus, CircuitBreakerRegistry } from '../infrastructure/resilience/CircuitBreaker';
import { RetryPolicy } from '../infrastructure/resilience/RetryPolicy';
import { ResultCache } from '../infrastructure/cache/ResultCache';
import { FileCacheStore } from '../infrastructure/cache/FileCacheStore';
import { RedisCacheStore } from '../infrastructure/cache/RedisCacheStore';
import { InMemoryCacheStore } from '../infrastructure/cache/InMemoryCacheStore';
import { PrometheusMetricsAdapter } from '../infrastructure/metrics/PrometheusMetricsAdapter';
import { ConsoleMetricsAdapter, NoOpMetricsAdapter } from '../infrastructure/metrics/ConsoleMetricsAdapter';
import { HttpPageFetcher, loadSubjectDirectory } from '../infrastructure/scraper/HttpPageFetcher';
import { OpenAIService } from '../infrastructure/llm/OpenAIService';
import { OpenAIRecordExtractor } from '../infrastructure/llm/OpenAIRecordExtractor';
import { WeightedFieldValidator } from '../infrastructure/validation/WeightedFieldValidator';
import { MarkdownDashboardRenderer } from '../infrastructure/rendering/MarkdownDashboardRenderer';

// Route imports
import { createDashboardRoutes } from './routes/dashboardRoutes';
import { createOpsRoutes } from './routes/opsRoutes';
import { errorHandler, asyncHandler } from './middleware/errorHandler';

/**
 * Everything the HTTP layer serves from. Built by createDependencies, or by hand in tests.
 */
export interface AppDependencies {
    orchestrator: PipelineOrchestrator;
    backgroundTasks: BackgroundTaskRegistry;
    breakers: CircuitBreakerRegistry;
    rateLimiter: RateLimiter;
    /** Exposed at GET /metrics when present */
    prometheus?: PrometheusMetricsAdapter;
}

export interface AppContainer extends AppDependencies {
    /** Drains background work and releases connections */
    close(): Promise<void>;
}

const BREAKER_STATE_VALUE: Record<BreakerStatus, number> = { CLOSED: 0, HALF_OPEN: 1, OPEN: 2 };

/**
 * Creates and configures the Express application.
 */
export function createApp(deps: AppDependencies): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
            cacheStrategy: deps.orchestrator.strategy,
            pendingRefreshes: deps.backgroundTasks.pendingCount,
        });
    });

    const prometheus = deps.prometheus;
    if (prometheus) {
        app.get(
            '/metrics',
            asyncHandler(async (req: Request, res: Response) => {
                res.set('Content-Type', prometheus.contentType);
                res.send(await prometheus.getMetrics());
            })
        );
    }

    // Routes
    app.use('/api', createDashboardRoutes(deps.orchestrator));
    app.use('/api', createOpsRoutes(deps));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export async function createDependencies(config: Config): Promise<AppContainer> {
    const { metrics, prometheus } = createMetrics(config);

    const rateLimiter = new RateLimiter({ defaultRate: config.rateLimitDefaultRps });
    for (const [host, rate] of Object.entries(config.rateLimitHostOverrides)) {
        rateLimiter.setRate(host, rate);
    }

    const breakers = new CircuitBreakerRegistry({
        failureThreshold: config.breakerFailureThreshold,
        recoveryTimeoutMs: config.breakerRecoveryTimeoutMs,
        onStateChange: (operation, from, to) => {
            console.warn(`[CircuitBreaker] ${operation}: ${from} -> ${to}`);
            metrics.incrementCounter(METRICS.BREAKER_TRANSITIONS, { operation, from, to });
            metrics.recordGauge(METRICS.BREAKER_STATE, BREAKER_STATE_VALUE[to], { operation });
        },
    });

    const retryPolicy = new RetryPolicy({
        maxAttempts: config.retryMaxAttempts,
        baseDelayMs: config.retryBaseDelayMs,
        maxDelayMs: config.retryMaxDelayMs,
    });

    const backgroundTasks = new BackgroundTaskRegistry(pending => {
        metrics.recordGauge(METRICS.PENDING_REFRESHES, pending);
    });

    const { store, disconnect } = createCacheStore(config);
    const cache = await ResultCache.open<DashboardResult>(store, { isValue: isDashboardResult });

    const openAIService = new OpenAIService(config.openaiApiKey, config.openaiModel, config.openaiBaseUrl);

    const orchestrator = new PipelineOrchestrator(
        {
            fetcher: new HttpPageFetcher({
                subjects: loadSubjectDirectory(path.resolve(process.cwd(), config.subjectsFile)),
                timeout: config.fetchPageTimeoutMs,
                budgetMs: fetchBudgetMs(config),
            }),
            extractor: new OpenAIRecordExtractor(openAIService),
            validator: new WeightedFieldValidator(),
            renderer: new MarkdownDashboardRenderer(),
            cache,
            executor: new ResilientExecutor({ rateLimiter, breakers, retryPolicy, metrics }),
            backgroundTasks,
            metrics,
        },
        {
            cacheStrategy: config.cacheStrategy,
            freshnessWindowMs: config.cacheMaxAgeMs,
            backgroundRefresh: config.backgroundRefreshEnabled,
            timeouts: {
                FETCHING: config.fetchTimeoutMs,
                EXTRACTING: config.extractTimeoutMs,
                RENDERING: config.renderTimeoutMs,
            },
        }
    );

    return {
        orchestrator,
        backgroundTasks,
        breakers,
        rateLimiter,
        prometheus,
        close: async () => {
            await orchestrator.shutdown();
            await disconnect();
        },
    };
}

function createMetrics(config: Config): { metrics: IMetricsPort; prometheus?: PrometheusMetricsAdapter } {
    switch (config.metricsAdapter) {
        case 'prometheus': {
            const prometheus = new PrometheusMetricsAdapter();
            return { metrics: prometheus, prometheus };
        }
        case 'console':
            return { metrics: new ConsoleMetricsAdapter() };
        case 'none':
            return { metrics: new NoOpMetricsAdapter() };
    }
}

/**
 * Redis when REDIS_URL is set, else files under CACHE_DIR, else memory only.
 */
function createCacheStore(config: Config): { store: ICacheStore; disconnect: () => Promise<void> } {
    if (config.redisUrl) {
        console.log('[Cache] Using Redis cache store');
        const store = new RedisCacheStore(config.redisUrl);
        return { store, disconnect: () => store.disconnect() };
    }

    if (config.cacheDir) {
        const directory = path.resolve(process.cwd(), config.cacheDir);
        console.log(`[Cache] Using file cache store at ${directory}`);
        return { store: new FileCacheStore(directory), disconnect: async () => undefined };
    }

    console.warn('[Cache] No CACHE_DIR or REDIS_URL configured, cache will not survive restarts');
    return { store: new InMemoryCacheStore(), disconnect: async () => undefined };
}
