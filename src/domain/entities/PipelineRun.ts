import { DashboardResult } from './CompanyIntel';
import { ErrorKind, PipelineError, classifyError, errorMessage } from '../errors/PipelineErrors';

/**
 * Stages of a pipeline run.
 * INITIALIZED -> FETCHING -> EXTRACTING -> VALIDATING -> RENDERING -> COMPLETED,
 * with FAILED reachable from any stage and CANCELLED from any stage boundary.
 */
export type PipelineStage =
    | 'INITIALIZED'
    | 'FETCHING'
    | 'EXTRACTING'
    | 'VALIDATING'
    | 'RENDERING'
    | 'COMPLETED'
    | 'FAILED'
    | 'CANCELLED';

export type WorkStage = 'FETCHING' | 'EXTRACTING' | 'VALIDATING' | 'RENDERING';
export type RemoteStage = 'FETCHING' | 'EXTRACTING' | 'RENDERING';

export const TERMINAL_STAGES: readonly PipelineStage[] = ['COMPLETED', 'FAILED', 'CANCELLED'];

/**
 * Progress milestones for each working stage: [on start, on completion].
 */
export const STAGE_MILESTONES: Record<WorkStage, readonly [number, number]> = {
    FETCHING: [20, 40],
    EXTRACTING: [50, 70],
    VALIDATING: [75, 80],
    RENDERING: [85, 95],
};

export interface PipelineFailure {
    kind: ErrorKind;
    stage: PipelineStage;
    code: string;
    name: string;
    message: string;
}

export type PipelineOutcome =
    | { status: 'completed'; result: DashboardResult; cached: boolean }
    | { status: 'failed'; error: PipelineFailure }
    | { status: 'cancelled'; reason: string };

export interface PipelineRun {
    readonly runId: string;
    readonly subjectKey: string;
    readonly variant: string;
    stage: PipelineStage;
    progressPct: number;
    startedAt: Date;
    updatedAt: Date;
    outcome?: PipelineOutcome;
}

/**
 * Immutable snapshot emitted on every stage transition.
 */
export interface ProgressEvent {
    readonly runId: string;
    readonly stage: PipelineStage;
    readonly progressPct: number;
    readonly message: string;
    readonly timestamp: string;
    readonly metadata: Readonly<Record<string, unknown>>;
}

export function createPipelineRun(runId: string, subjectKey: string, variant: string): PipelineRun {
    const now = new Date();
    return {
        runId,
        subjectKey,
        variant,
        stage: 'INITIALIZED',
        progressPct: 0,
        startedAt: now,
        updatedAt: now,
    };
}

/**
 * Moves a run forward. Progress never goes backwards within a run.
 */
export function advanceRun(run: PipelineRun, stage: PipelineStage, progressPct: number): PipelineRun {
    if (isRunTerminal(run)) {
        throw new Error(`Run ${run.runId} is already ${run.stage}`);
    }
    return {
        ...run,
        stage,
        progressPct: Math.max(run.progressPct, clampPct(progressPct)),
        updatedAt: new Date(),
    };
}

export function finishRun(run: PipelineRun, outcome: PipelineOutcome): PipelineRun {
    const stage: PipelineStage =
        outcome.status === 'completed' ? 'COMPLETED' : outcome.status === 'failed' ? 'FAILED' : 'CANCELLED';
    const progressPct = outcome.status === 'completed' ? 100 : run.progressPct;
    return { ...advanceRun(run, stage, progressPct), outcome };
}

export function isRunTerminal(run: PipelineRun): boolean {
    return TERMINAL_STAGES.includes(run.stage);
}

export function createProgressEvent(
    run: PipelineRun,
    message: string,
    metadata: Record<string, unknown> = {}
): ProgressEvent {
    return Object.freeze({
        runId: run.runId,
        stage: run.stage,
        progressPct: run.progressPct,
        message,
        timestamp: new Date().toISOString(),
        metadata: Object.freeze({ ...metadata }),
    });
}

/**
 * Describes a stage failure for the terminal FAILED event.
 */
export function toPipelineFailure(error: unknown, stage: PipelineStage): PipelineFailure {
    return {
        kind: classifyError(error),
        stage,
        code: error instanceof PipelineError ? error.code : 'UNKNOWN_ERROR',
        name: error instanceof Error ? error.name : 'Error',
        message: errorMessage(error),
    };
}

function clampPct(value: number): number {
    return Math.min(100, Math.max(0, value));
}
