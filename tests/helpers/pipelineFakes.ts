import {
    DashboardArtifact,
    DashboardResult,
    PageBundle,
    StructuredRecord,
    isDashboardResult,
    toCompanyId,
} from '../../src/domain/entities/CompanyIntel';
import { PipelineOutcome } from '../../src/domain/entities/PipelineRun';
import { ICacheStore } from '../../src/domain/ports/ICacheStore';
import { IPageFetcher } from '../../src/domain/ports/IPageFetcher';
import { IRecordExtractor } from '../../src/domain/ports/IRecordExtractor';
import { IDashboardRenderer } from '../../src/domain/ports/IDashboardRenderer';
import { OrchestratorOptions, PipelineOrchestrator } from '../../src/application/PipelineOrchestrator';
import { BackgroundTaskRegistry } from '../../src/application/BackgroundTaskRegistry';
import { ResilientExecutor } from '../../src/application/services/ResilientExecutor';
import { ResultCache } from '../../src/infrastructure/cache/ResultCache';
import { InMemoryCacheStore } from '../../src/infrastructure/cache/InMemoryCacheStore';
import { RateLimiter } from '../../src/infrastructure/resilience/RateLimiter';
import { CircuitBreakerRegistry } from '../../src/infrastructure/resilience/CircuitBreaker';
import { RetryPolicy } from '../../src/infrastructure/resilience/RetryPolicy';
import { WeightedFieldValidator } from '../../src/infrastructure/validation/WeightedFieldValidator';
import { NoOpMetricsAdapter } from '../../src/infrastructure/metrics/ConsoleMetricsAdapter';
import { IMetricsPort } from '../../src/domain/ports/IMetricsPort';

export function acmeBundle(subjectKey: string): PageBundle {
    return {
        subjectKey,
        website: 'https://acme.example.com',
        pages: [
            { url: 'https://acme.example.com', title: 'Acme Co', text: 'Acme builds reusable rockets.' },
            { url: 'https://acme.example.com/about', text: 'Founded in 2019 by Jane Doe.' },
        ],
        fetchedAt: '2026-01-01T00:00:00.000Z',
    };
}

/**
 * A record with every scored field present (validates to 100/100).
 */
export function acmeRecord(subjectKey: string = 'AcmeCo'): StructuredRecord {
    return {
        subjectKey,
        legalName: 'Acme Corporation',
        website: 'https://acme.example.com',
        foundedYear: 2019,
        description: 'Acme builds reusable rockets.',
        headquarters: 'Berlin, Germany',
        totalRaisedUsd: 25000000,
        fundingEvents: [{ round: 'Series A', amountUsd: 20000000, date: '2023-05', investors: ['Orbit Ventures'] }],
        leadership: [{ name: 'Sam Lee', title: 'CTO' }],
        founders: [{ name: 'Jane Doe', title: 'CEO' }],
        products: [{ name: 'Falcon Kit', description: 'Launch-in-a-box' }],
        metrics: [{ label: 'Customers', value: '120', asOf: '2025-12' }],
        mentions: [{ source: 'Launch Weekly', headline: 'Acme closes Series A' }],
    };
}

export function cachedResult(subjectKey: string, variant: string): DashboardResult {
    return {
        subjectKey,
        companyId: toCompanyId(subjectKey),
        variant,
        artifact: { variant, format: 'markdown', content: `# cached ${variant}` },
        generatedAt: '2026-01-01T00:00:00.000Z',
        qualityTag: 'high',
        validation: { score: 100, maxScore: 100, issues: [] },
        metadata: { pagesFetched: 2, durationMs: 10, cacheStrategy: 'balanced' },
    };
}

export class FakeFetcher implements IPageFetcher {
    readonly fetch = jest.fn(
        async (subjectKey: string, _signal?: AbortSignal): Promise<PageBundle> => acmeBundle(subjectKey)
    );

    resourceKey(_subjectKey: string): string {
        return 'acme.example.com';
    }
}

export class FakeExtractor implements IRecordExtractor {
    readonly resourceKey = 'llm.test';
    readonly extract = jest.fn(
        async (bundle: PageBundle, _signal?: AbortSignal): Promise<StructuredRecord> => acmeRecord(bundle.subjectKey)
    );
}

export class FakeRenderer implements IDashboardRenderer {
    readonly resourceKey = 'renderer.test';
    readonly render = jest.fn(
        async (record: StructuredRecord, variant: string, _signal?: AbortSignal): Promise<DashboardArtifact> => ({
            variant,
            format: 'markdown',
            content: `# ${record.legalName ?? record.subjectKey} (${variant})`,
        })
    );
}

export interface HarnessOptions extends OrchestratorOptions {
    store?: ICacheStore;
    failureThreshold?: number;
    metrics?: IMetricsPort;
}

export interface PipelineHarness {
    orchestrator: PipelineOrchestrator;
    fetcher: FakeFetcher;
    extractor: FakeExtractor;
    renderer: FakeRenderer;
    cache: ResultCache<DashboardResult>;
    backgroundTasks: BackgroundTaskRegistry;
    breakers: CircuitBreakerRegistry;
    rateLimiter: RateLimiter;
}

/**
 * Orchestrator over fake collaborators, an in-memory cache and fast retries.
 * Background refresh is off unless the options turn it on.
 */
export async function createPipelineHarness(options: HarnessOptions = {}): Promise<PipelineHarness> {
    const { store, failureThreshold, metrics = new NoOpMetricsAdapter(), ...orchestratorOptions } = options;

    const cache = await ResultCache.open(store ?? new InMemoryCacheStore(), { isValue: isDashboardResult });
    const rateLimiter = new RateLimiter({ defaultRate: 100 });
    const breakers = new CircuitBreakerRegistry({ failureThreshold: failureThreshold ?? 5 });
    const retryPolicy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, random: () => 0.5 });
    const backgroundTasks = new BackgroundTaskRegistry();
    const fetcher = new FakeFetcher();
    const extractor = new FakeExtractor();
    const renderer = new FakeRenderer();

    const orchestrator = new PipelineOrchestrator(
        {
            fetcher,
            extractor,
            validator: new WeightedFieldValidator(),
            renderer,
            cache,
            executor: new ResilientExecutor({ rateLimiter, breakers, retryPolicy, metrics }),
            backgroundTasks,
            metrics,
        },
        { backgroundRefresh: false, ...orchestratorOptions }
    );

    return { orchestrator, fetcher, extractor, renderer, cache, backgroundTasks, breakers, rateLimiter };
}

export function expectCompleted(outcome: PipelineOutcome): Extract<PipelineOutcome, { status: 'completed' }> {
    if (outcome.status !== 'completed') {
        throw new Error(`Expected a completed run, got ${outcome.status}`);
    }
    return outcome;
}

export function expectFailed(outcome: PipelineOutcome): Extract<PipelineOutcome, { status: 'failed' }> {
    if (outcome.status !== 'failed') {
        throw new Error(`Expected a failed run, got ${outcome.status}`);
    }
    return outcome;
}

export function silenceConsole(): void {
    jest.spyOn(console, 'log').mockImplementation(() => { });
    jest.spyOn(console, 'warn').mockImplementation(() => { });
    jest.spyOn(console, 'error').mockImplementation(() => { });
}
