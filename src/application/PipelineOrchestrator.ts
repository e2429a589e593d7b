import { v4 as uuidv4 } from 'uuid';
import {
    DashboardResult,
    qualityTagForScore,
    toCompanyId,
} from '../domain/entities/CompanyIntel';
import {
    PipelineOutcome,
    PipelineRun,
    PipelineStage,
    ProgressEvent,
    RemoteStage,
    STAGE_MILESTONES,
    advanceRun,
    createPipelineRun,
    createProgressEvent,
    finishRun,
    isRunTerminal,
    toPipelineFailure,
} from '../domain/entities/PipelineRun';
import { CACHE_STRATEGY_TTL_MS, CacheStrategy } from '../domain/entities/CacheEntry';
import { CacheError, PermanentError, errorMessage } from '../domain/errors/PipelineErrors';
import { IPageFetcher } from '../domain/ports/IPageFetcher';
import { IRecordExtractor } from '../domain/ports/IRecordExtractor';
import { IRecordValidator } from '../domain/ports/IRecordValidator';
import { IDashboardRenderer } from '../domain/ports/IDashboardRenderer';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { ResultCache } from '../infrastructure/cache/ResultCache';
import { NoOpMetricsAdapter } from '../infrastructure/metrics/ConsoleMetricsAdapter';
import { ProgressChannel } from './ProgressChannel';
import { BackgroundTaskRegistry } from './BackgroundTaskRegistry';
import { ResilientExecutor } from './services/ResilientExecutor';
import {
    PipelineStep,
    RunCancelledError,
    RunContext,
    createRunContext,
    executePipeline,
    throwIfCancelled,
} from './pipelines/PipelineInfrastructure';
import { FetchStep } from './pipelines/steps/FetchStep';
import { ExtractStep } from './pipelines/steps/ExtractStep';
import { ValidateStep } from './pipelines/steps/ValidateStep';
import { RenderStep } from './pipelines/steps/RenderStep';

export interface OrchestratorDependencies {
    fetcher: IPageFetcher;
    extractor: IRecordExtractor;
    validator: IRecordValidator;
    renderer: IDashboardRenderer;
    cache: ResultCache<DashboardResult>;
    executor: ResilientExecutor;
    backgroundTasks: BackgroundTaskRegistry;
    metrics?: IMetricsPort;
}

export interface OrchestratorOptions {
    /** Decides the TTL of written results (default: balanced) */
    cacheStrategy?: CacheStrategy;
    /** Cached results older than this are ignored even before they expire */
    freshnessWindowMs?: number;
    /** Schedule a forced re-run one TTL after every successful run (default: true) */
    backgroundRefresh?: boolean;
    /** Per-attempt timeout for each remote stage */
    timeouts?: Partial<Record<RemoteStage, number>>;
}

export interface RunOptions {
    /** Skip the cache read and always run every stage */
    forceRefresh?: boolean;
}

/**
 * Live view of one run. `events` replays the full history to every consumer and closes after
 * the terminal event; `completion` resolves with the outcome and never rejects.
 */
export interface PipelineRunHandle {
    readonly runId: string;
    readonly events: ProgressChannel<ProgressEvent>;
    readonly completion: Promise<PipelineOutcome>;
    cancel(reason?: string): void;
    snapshot(): PipelineRun;
}

interface ActiveRun {
    run: PipelineRun;
    readonly events: ProgressChannel<ProgressEvent>;
    readonly controller: AbortController;
    readonly forceRefresh: boolean;
    readonly startedAt: number;
}

const DEFAULT_TIMEOUTS: Record<RemoteStage, number> = {
    FETCHING: 30000,
    EXTRACTING: 120000,
    RENDERING: 60000,
};

/**
 * PipelineOrchestrator drives dashboard runs: fetch -> extract -> validate -> render.
 *
 * Results are read from and written to the ResultCache, remote stages go through the
 * ResilientExecutor, and every stage transition is published on the run's progress channel.
 *
 * Two concurrent misses for the same subject and variant both run the full pipeline; the
 * later cache write wins.
 */
export class PipelineOrchestrator {
    private readonly steps: PipelineStep[];
    private readonly metrics: IMetricsPort;
    private readonly cacheStrategy: CacheStrategy;
    private readonly ttlMs: number;
    private readonly backgroundRefresh: boolean;

    constructor(
        private readonly deps: OrchestratorDependencies,
        private readonly options: OrchestratorOptions = {}
    ) {
        const timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };

        this.steps = [
            new FetchStep(deps.fetcher, deps.executor, timeouts.FETCHING),
            new ExtractStep(deps.extractor, deps.executor, timeouts.EXTRACTING),
            new ValidateStep(deps.validator),
            new RenderStep(deps.renderer, deps.executor, timeouts.RENDERING),
        ];
        this.metrics = deps.metrics ?? new NoOpMetricsAdapter();
        this.cacheStrategy = options.cacheStrategy ?? 'balanced';
        this.ttlMs = CACHE_STRATEGY_TTL_MS[this.cacheStrategy];
        this.backgroundRefresh = options.backgroundRefresh ?? true;
    }

    /**
     * Starts a run. The INITIALIZED event is already published when this returns.
     */
    run(subjectKey: string, variant: string, options: RunOptions = {}): PipelineRunHandle {
        const runId = `run_${uuidv4().substring(0, 8)}`;
        const active: ActiveRun = {
            run: createPipelineRun(runId, subjectKey, variant),
            events: new ProgressChannel<ProgressEvent>(),
            controller: new AbortController(),
            forceRefresh: options.forceRefresh ?? false,
            startedAt: Date.now(),
        };

        const completion = this.drive(active);

        return {
            runId,
            events: active.events,
            completion,
            cancel: (reason: string = 'cancelled by caller') => {
                if (isRunTerminal(active.run) || active.controller.signal.aborted) return;
                console.log(`[Pipeline] ${runId} cancellation requested: ${reason}`);
                active.controller.abort(reason);
            },
            snapshot: () => ({ ...active.run }),
        };
    }

    /**
     * Cached result for a subject and variant, without running anything.
     */
    async getCached(subjectKey: string, variant: string): Promise<DashboardResult | null> {
        return this.readCache(this.cacheKey(subjectKey, variant));
    }

    /**
     * Drops every cached variant of a subject and any refresh pending for it.
     */
    async invalidateSubject(subjectKey: string): Promise<number> {
        const ownsKey = (key: string) => this.isSubjectKey(key, subjectKey);

        for (const task of this.deps.backgroundTasks.list()) {
            if (task.status === 'pending' && ownsKey(task.key)) {
                this.deps.backgroundTasks.cancel(task.key);
            }
        }

        const keys = this.deps.cache.keys().filter(ownsKey);
        const results = await Promise.all(keys.map(key => this.deps.cache.invalidate(key)));
        const removed = results.filter(Boolean).length;
        console.log(`[Pipeline] Invalidated ${removed} cached dashboards for ${subjectKey}`);
        return removed;
    }

    /**
     * Cancels pending refreshes and waits for running ones.
     */
    async shutdown(): Promise<void> {
        console.log('[Pipeline] Shutting down, draining background refreshes...');
        await this.deps.backgroundTasks.shutdown();
    }

    cacheKey(subjectKey: string, variant: string): string {
        return `live_dashboard_${toCompanyId(subjectKey)}_${variant}`;
    }

    /**
     * Company ids may contain "_" but variants may not, so the variant is everything after the
     * last one. "acme" owns live_dashboard_acme_brief but not live_dashboard_acme_corp_brief.
     */
    private isSubjectKey(key: string, subjectKey: string): boolean {
        const prefix = `live_dashboard_${toCompanyId(subjectKey)}_`;
        if (!key.startsWith(prefix)) return false;
        const variant = key.substring(prefix.length);
        return variant.length > 0 && !variant.includes('_');
    }

    get strategy(): CacheStrategy {
        return this.cacheStrategy;
    }

    private async drive(active: ActiveRun): Promise<PipelineOutcome> {
        const { runId, subjectKey, variant } = active.run;
        const cacheKey = this.cacheKey(subjectKey, variant);
        const useCache = this.ttlMs > 0;

        this.metrics.incrementCounter(METRICS.RUNS_STARTED, { variant });
        this.emit(active, 'INITIALIZED', 0, `Starting ${variant} dashboard for ${subjectKey}`, {
            cacheKey,
            forceRefresh: active.forceRefresh,
        });

        try {
            if (variant.includes('_')) {
                throw new PermanentError(`Variant "${variant}" must not contain "_"`, 'INVALID_VARIANT', { variant });
            }

            if (useCache && !active.forceRefresh) {
                const cached = await this.readCache(cacheKey);
                if (cached) {
                    this.metrics.incrementCounter(METRICS.CACHE_HITS, { variant });
                    this.checkCancelled(active);
                    console.log(`[Pipeline] ${runId} served from cache (${cacheKey})`);
                    return this.complete(active, cached, true);
                }
                this.metrics.incrementCounter(METRICS.CACHE_MISSES, { variant });
            }

            const context = await executePipeline(
                createRunContext(runId, subjectKey, variant, active.controller.signal),
                this.steps,
                {
                    onStepStart: step => {
                        const [startPct] = STAGE_MILESTONES[step.stage];
                        this.emit(active, step.stage, startPct, `${step.name} started`);
                    },
                    onStepComplete: (step, _context, durationMs) => {
                        const [, endPct] = STAGE_MILESTONES[step.stage];
                        this.metrics.recordDuration(METRICS.STAGE_DURATION, durationMs, { stage: step.stage });
                        this.emit(active, step.stage, endPct, `${step.name} completed`, { durationMs });
                    },
                }
            );

            const result = this.buildResult(context, active.startedAt);

            throwIfCancelled(context);
            if (useCache) {
                await this.writeCache(cacheKey, result);
                this.scheduleRefresh(subjectKey, variant, cacheKey);
            }

            return this.complete(active, result, false);
        } catch (error) {
            if (error instanceof RunCancelledError || active.controller.signal.aborted) {
                return this.cancelled(active, reasonOf(active.controller.signal, error));
            }
            return this.fail(active, error);
        }
    }

    private buildResult(context: RunContext, startedAt: number): DashboardResult {
        const { artifact, validation, bundle } = context;
        if (!artifact || !validation) {
            throw new PermanentError('Pipeline finished without an artifact', 'MISSING_INPUT');
        }

        const percentage = validation.maxScore > 0 ? (validation.score / validation.maxScore) * 100 : 0;

        return {
            subjectKey: context.subjectKey,
            companyId: toCompanyId(context.subjectKey),
            variant: context.variant,
            artifact,
            generatedAt: new Date().toISOString(),
            qualityTag: qualityTagForScore(percentage),
            validation,
            metadata: {
                pagesFetched: bundle?.pages.length ?? 0,
                durationMs: Date.now() - startedAt,
                cacheStrategy: this.cacheStrategy,
            },
        };
    }

    private async readCache(cacheKey: string): Promise<DashboardResult | null> {
        try {
            return await this.deps.cache.get(cacheKey, this.options.freshnessWindowMs);
        } catch (error) {
            if (error instanceof CacheError) {
                console.warn(`[Pipeline] Cache read failed for ${cacheKey}, treating as miss: ${error.message}`);
                return null;
            }
            throw error;
        }
    }

    private async writeCache(cacheKey: string, result: DashboardResult): Promise<void> {
        try {
            await this.deps.cache.set(cacheKey, result, this.ttlMs, result.qualityTag);
        } catch (error) {
            if (!(error instanceof CacheError)) throw error;
            this.metrics.incrementCounter(METRICS.CACHE_WRITE_FAILURES);
            console.error(`[Pipeline] Failed to persist ${cacheKey}, result not cached: ${error.message}`);
        }
    }

    private scheduleRefresh(subjectKey: string, variant: string, cacheKey: string): void {
        if (!this.backgroundRefresh) return;

        this.deps.backgroundTasks.schedule(
            cacheKey,
            this.ttlMs,
            () => this.refresh(subjectKey, variant, cacheKey),
            `refresh ${cacheKey}`
        );
    }

    private async refresh(subjectKey: string, variant: string, cacheKey: string): Promise<void> {
        console.log(`[Refresh] Refreshing ${cacheKey}`);
        const outcome = await this.run(subjectKey, variant, { forceRefresh: true }).completion;

        if (outcome.status === 'completed') {
            console.log(`[Refresh] ${cacheKey} refreshed`);
        } else if (outcome.status === 'failed') {
            console.warn(`[Refresh] ${cacheKey} refresh failed at ${outcome.error.stage}: ${outcome.error.message}`);
        } else {
            console.warn(`[Refresh] ${cacheKey} refresh cancelled: ${outcome.reason}`);
        }
    }

    private checkCancelled(active: ActiveRun): void {
        if (active.controller.signal.aborted) {
            throw new RunCancelledError(reasonOf(active.controller.signal, null));
        }
    }

    private emit(
        active: ActiveRun,
        stage: PipelineStage,
        progressPct: number,
        message: string,
        metadata: Record<string, unknown> = {}
    ): void {
        active.run = advanceRun(active.run, stage, progressPct);
        active.events.publish(createProgressEvent(active.run, message, metadata));
    }

    private complete(active: ActiveRun, result: DashboardResult, cached: boolean): PipelineOutcome {
        const outcome: PipelineOutcome = { status: 'completed', result, cached };
        this.metrics.incrementCounter(METRICS.RUNS_COMPLETED, { variant: result.variant, cached });
        return this.finish(active, outcome, cached ? 'Served from cache' : 'Dashboard ready', {
            cached,
            result,
        });
    }

    private fail(active: ActiveRun, error: unknown): PipelineOutcome {
        const failure = toPipelineFailure(error, active.run.stage);
        console.error(
            `[Pipeline] ${active.run.runId} failed at ${failure.stage} (${failure.kind}/${failure.code}): ${failure.message}`
        );
        this.metrics.incrementCounter(METRICS.RUNS_FAILED, { stage: failure.stage, kind: failure.kind });
        return this.finish(active, { status: 'failed', error: failure }, `Failed: ${failure.message}`, {
            error: failure,
        });
    }

    private cancelled(active: ActiveRun, reason: string): PipelineOutcome {
        console.log(`[Pipeline] ${active.run.runId} cancelled at ${active.run.stage}: ${reason}`);
        this.metrics.incrementCounter(METRICS.RUNS_CANCELLED, { stage: active.run.stage });
        return this.finish(active, { status: 'cancelled', reason }, `Cancelled: ${reason}`, {
            reason,
            stage: active.run.stage,
        });
    }

    private finish(
        active: ActiveRun,
        outcome: PipelineOutcome,
        message: string,
        metadata: Record<string, unknown>
    ): PipelineOutcome {
        active.run = finishRun(active.run, outcome);
        active.events.publish(createProgressEvent(active.run, message, metadata));
        active.events.close();
        this.metrics.recordDuration(METRICS.RUN_DURATION, Date.now() - active.startedAt, {
            status: outcome.status,
        });
        return outcome;
    }
}

function reasonOf(signal: AbortSignal, error: unknown): string {
    if (error instanceof RunCancelledError) return error.reason;
    if (typeof signal.reason === 'string') return signal.reason;
    return errorMessage(signal.reason ?? 'cancelled');
}
