import { Router, Request, Response } from 'express';
import { PipelineOrchestrator } from '../../application/PipelineOrchestrator';
import { PipelineOutcome } from '../../domain/entities/PipelineRun';
import { asyncHandler, BadRequestError, NotFoundError } from '../middleware/errorHandler';

interface RunRequest {
    subject: string;
    variant: string;
    forceRefresh: boolean;
}

const DEFAULT_VARIANT = 'structured';

function parseRunRequest(body: unknown): RunRequest {
    if (typeof body !== 'object' || body === null) {
        throw new BadRequestError('Request body must be a JSON object');
    }
    const fields: Record<string, unknown> = { ...body };
    const { subject, variant, forceRefresh } = fields;

    if (typeof subject !== 'string' || subject.trim().length === 0) {
        throw new BadRequestError('subject is required');
    }
    if (variant !== undefined && (typeof variant !== 'string' || variant.trim().length === 0)) {
        throw new BadRequestError('variant must be a non-empty string');
    }
    if (forceRefresh !== undefined && typeof forceRefresh !== 'boolean') {
        throw new BadRequestError('forceRefresh must be a boolean');
    }

    return {
        subject: subject.trim(),
        variant: typeof variant === 'string' ? variant.trim() : DEFAULT_VARIANT,
        forceRefresh: forceRefresh === true,
    };
}

function statusForOutcome(outcome: PipelineOutcome): number {
    switch (outcome.status) {
        case 'completed':
            return 200;
        case 'failed':
            return 502;
        case 'cancelled':
            return 409;
    }
}

/**
 * Creates dashboard routes with dependency injection.
 */
export function createDashboardRoutes(orchestrator: PipelineOrchestrator): Router {
    const router = Router();

    /**
     * GET /dashboards/:subject/:variant/stream
     *
     * Runs the pipeline and streams every progress event as Server-Sent Events.
     * Closing the connection cancels the run.
     */
    router.get(
        '/dashboards/:subject/:variant/stream',
        asyncHandler(async (req: Request, res: Response) => {
            const { subject, variant } = req.params;
            const forceRefresh = req.query.forceRefresh === 'true';

            const handle = orchestrator.run(subject, variant, { forceRefresh });
            let finished = false;

            res.writeHead(200, {
                'Content-Type': 'text/event-stream',
                'Cache-Control': 'no-cache',
                Connection: 'keep-alive',
            });

            res.on('close', () => {
                if (!finished) {
                    handle.cancel('client disconnected');
                }
            });

            for await (const event of handle.events) {
                res.write(`event: progress\ndata: ${JSON.stringify(event)}\n\n`);
            }

            finished = true;
            res.end();
        })
    );

    /**
     * POST /dashboards
     *
     * Runs the pipeline to completion and returns the outcome.
     * 200 completed, 502 failed, 409 cancelled.
     */
    router.post(
        '/dashboards',
        asyncHandler(async (req: Request, res: Response) => {
            const { subject, variant, forceRefresh } = parseRunRequest(req.body);

            const handle = orchestrator.run(subject, variant, { forceRefresh });
            const outcome = await handle.completion;

            res.status(statusForOutcome(outcome)).json({
                runId: handle.runId,
                ...outcome,
            });
        })
    );

    /**
     * GET /dashboards/:subject/:variant
     *
     * Returns the cached dashboard without running the pipeline.
     */
    router.get(
        '/dashboards/:subject/:variant',
        asyncHandler(async (req: Request, res: Response) => {
            const { subject, variant } = req.params;
            const cached = await orchestrator.getCached(subject, variant);

            if (!cached) {
                throw new NotFoundError(`No cached ${variant} dashboard for ${subject}`);
            }

            res.json(cached);
        })
    );

    /**
     * DELETE /dashboards/:subject
     *
     * Evicts every cached variant of a subject.
     */
    router.delete(
        '/dashboards/:subject',
        asyncHandler(async (req: Request, res: Response) => {
            const { subject } = req.params;
            const removed = await orchestrator.invalidateSubject(subject);
            res.json({ subject, removed });
        })
    );

    return router;
}
