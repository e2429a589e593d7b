/**
 * Pipeline infrastructure for the dashboard run.
 * Each step owns one stage: it reads what earlier steps left on the context and adds its own output.
 */

import {
    DashboardArtifact,
    PageBundle,
    StructuredRecord,
    ValidationReport,
} from '../../domain/entities/CompanyIntel';
import { WorkStage } from '../../domain/entities/PipelineRun';

/**
 * RunContext carries all state through the pipeline.
 * Immutable pattern: each step returns a new context.
 */
export interface RunContext {
    readonly runId: string;
    readonly subjectKey: string;
    readonly variant: string;
    /** Aborted when the run is cancelled */
    readonly signal: AbortSignal;

    // Fetching
    bundle?: PageBundle;

    // Extracting
    record?: StructuredRecord;

    // Validating
    validation?: ValidationReport;

    // Rendering
    artifact?: DashboardArtifact;
}

/**
 * Pipeline step interface.
 * Each step has exactly one responsibility.
 */
export interface PipelineStep {
    readonly name: string;
    readonly stage: WorkStage;
    execute(context: RunContext): Promise<RunContext>;
}

export interface PipelineHooks {
    onStepStart?: (step: PipelineStep, context: RunContext) => void;
    onStepComplete?: (step: PipelineStep, context: RunContext, durationMs: number) => void;
}

/**
 * Thrown at a step boundary once the run's signal is aborted.
 */
export class RunCancelledError extends Error {
    constructor(public readonly reason: string) {
        super(`Run cancelled: ${reason}`);
        this.name = 'RunCancelledError';
    }
}

export function createRunContext(
    runId: string,
    subjectKey: string,
    variant: string,
    signal: AbortSignal
): RunContext {
    return { runId, subjectKey, variant, signal };
}

/**
 * Throws RunCancelledError if the context's signal has been aborted.
 */
export function throwIfCancelled(context: RunContext): void {
    if (context.signal.aborted) {
        const reason = context.signal.reason;
        throw new RunCancelledError(typeof reason === 'string' ? reason : 'cancelled');
    }
}

/**
 * Executes a pipeline of steps sequentially. Cancellation is checked before every step.
 */
export async function executePipeline(
    context: RunContext,
    steps: PipelineStep[],
    hooks: PipelineHooks = {}
): Promise<RunContext> {
    let currentContext = context;

    for (const step of steps) {
        throwIfCancelled(currentContext);

        console.log(`[Pipeline] ${currentContext.runId} executing ${step.name}...`);
        hooks.onStepStart?.(step, currentContext);

        const startedAt = Date.now();
        currentContext = await step.execute(currentContext);

        hooks.onStepComplete?.(step, currentContext, Date.now() - startedAt);
    }

    return currentContext;
}
