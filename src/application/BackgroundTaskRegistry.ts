import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../domain/errors/PipelineErrors';

export type BackgroundTaskStatus = 'pending' | 'running';

export interface BackgroundTaskInfo {
    id: string;
    key: string;
    description: string;
    status: BackgroundTaskStatus;
    scheduledAt: Date;
    dueAt: Date;
}

interface PendingTask {
    info: BackgroundTaskInfo;
    timer: NodeJS.Timeout;
    task: () => Promise<void>;
}

interface RunningTask {
    info: BackgroundTaskInfo;
    promise: Promise<void>;
}

/**
 * Registry of delayed background work (refresh-ahead runs).
 *
 * Every scheduled task is visible through list(), can be cancelled while pending, and is
 * drained by shutdown(). At most one task is pending per key: scheduling again replaces it.
 * Pending timers do not keep the process alive.
 */
export class BackgroundTaskRegistry {
    private readonly pending: Map<string, PendingTask> = new Map();
    private readonly running: Map<string, RunningTask> = new Map();
    private closed = false;

    constructor(private readonly onChange?: (pendingCount: number) => void) { }

    /**
     * Runs `task` after `delayMs`. Returns null once the registry is shut down.
     */
    schedule(
        key: string,
        delayMs: number,
        task: () => Promise<void>,
        description: string = key
    ): BackgroundTaskInfo | null {
        if (this.closed) {
            console.warn(`[BackgroundTasks] Registry closed, not scheduling ${key}`);
            return null;
        }

        this.cancel(key);

        const now = Date.now();
        const info: BackgroundTaskInfo = {
            id: `task_${uuidv4().substring(0, 8)}`,
            key,
            description,
            status: 'pending',
            scheduledAt: new Date(now),
            dueAt: new Date(now + delayMs),
        };

        const timer = setTimeout(() => this.start(key), delayMs);
        timer.unref();

        this.pending.set(key, { info, timer, task });
        this.notify();
        return { ...info };
    }

    /**
     * Cancels the pending task for a key. Running tasks are left to finish.
     */
    cancel(key: string): boolean {
        const entry = this.pending.get(key);
        if (!entry) {
            return false;
        }
        clearTimeout(entry.timer);
        this.pending.delete(key);
        this.notify();
        return true;
    }

    list(): BackgroundTaskInfo[] {
        return [
            ...Array.from(this.running.values()).map(entry => ({ ...entry.info })),
            ...Array.from(this.pending.values()).map(entry => ({ ...entry.info })),
        ];
    }

    get pendingCount(): number {
        return this.pending.size;
    }

    get runningCount(): number {
        return this.running.size;
    }

    /**
     * Cancels every pending task and waits for running ones to settle.
     */
    async shutdown(): Promise<void> {
        this.closed = true;
        for (const key of Array.from(this.pending.keys())) {
            this.cancel(key);
        }
        await Promise.allSettled(Array.from(this.running.values()).map(entry => entry.promise));
    }

    private start(key: string): void {
        const entry = this.pending.get(key);
        if (!entry) return;
        this.pending.delete(key);

        const info: BackgroundTaskInfo = { ...entry.info, status: 'running' };
        const runKey = `${key}#${info.id}`;
        console.log(`[BackgroundTasks] Starting ${info.description}`);

        const promise = entry.task()
            .catch((error: unknown) => {
                console.error(`[BackgroundTasks] ${info.description} failed: ${errorMessage(error)}`);
            })
            .finally(() => {
                this.running.delete(runKey);
                this.notify();
            });

        this.running.set(runKey, { info, promise });
        this.notify();
    }

    private notify(): void {
        this.onChange?.(this.pending.size);
    }
}
