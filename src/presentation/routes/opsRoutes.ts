import { Router, Request, Response } from 'express';
import { BackgroundTaskRegistry } from '../../application/BackgroundTaskRegistry';
import { CircuitBreakerRegistry } from '../../infrastructure/resilience/CircuitBreaker';
import { RateLimiter } from '../../infrastructure/resilience/RateLimiter';
import { asyncHandler, NotFoundError } from '../middleware/errorHandler';

export interface OpsDependencies {
    backgroundTasks: BackgroundTaskRegistry;
    breakers: CircuitBreakerRegistry;
    rateLimiter: RateLimiter;
}

/**
 * Read-only operational views of the resilience layer.
 */
export function createOpsRoutes(deps: OpsDependencies): Router {
    const router = Router();

    /**
     * GET /ops/refresh
     *
     * Background refresh tasks, running first.
     */
    router.get(
        '/ops/refresh',
        asyncHandler(async (req: Request, res: Response) => {
            const tasks = deps.backgroundTasks.list().map(task => ({
                ...task,
                scheduledAt: task.scheduledAt.toISOString(),
                dueAt: task.dueAt.toISOString(),
            }));

            res.json({
                pending: deps.backgroundTasks.pendingCount,
                running: deps.backgroundTasks.runningCount,
                tasks,
            });
        })
    );

    /**
     * GET /ops/breakers
     */
    router.get(
        '/ops/breakers',
        asyncHandler(async (req: Request, res: Response) => {
            res.json({ breakers: deps.breakers.snapshot() });
        })
    );

    /**
     * GET /ops/limits/:resource
     *
     * Token bucket of one resource (usually a hostname).
     */
    router.get(
        '/ops/limits/:resource',
        asyncHandler(async (req: Request, res: Response) => {
            const { resource } = req.params;

            if (!deps.rateLimiter.resourceKeys().includes(resource)) {
                throw new NotFoundError(`No rate limit bucket for ${resource}`);
            }

            res.json({
                resource,
                budget: deps.rateLimiter.getBudget(resource),
                pendingAcquires: deps.rateLimiter.pendingAcquires(resource),
            });
        })
    );

    return router;
}
