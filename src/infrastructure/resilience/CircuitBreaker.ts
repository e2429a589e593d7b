import { BreakerOpenError } from '../../domain/errors/PipelineErrors';

export type BreakerStatus = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface BreakerState {
    status: BreakerStatus;
    consecutiveFailures: number;
    openedAt: number | null;
}

export interface CircuitBreakerOptions {
    /** Consecutive failures that open the circuit (default: 5) */
    failureThreshold?: number;
    /** Time the circuit stays open before a trial call is allowed (default: 60000) */
    recoveryTimeoutMs?: number;
    /** Which errors count as failures (default: all) */
    isFailure?: (error: unknown) => boolean;
    /** Called on every status transition */
    onStateChange?: (operationKey: string, from: BreakerStatus, to: BreakerStatus) => void;
    clock?: () => number;
}

/**
 * Fail-fast guard around one logical operation.
 *
 * CLOSED: calls pass; consecutive failures reaching the threshold open the circuit.
 * OPEN: calls are rejected with BreakerOpenError until the recovery timeout has elapsed,
 *       then the next call becomes the trial and the circuit goes HALF_OPEN.
 * HALF_OPEN: only the trial is in flight; its success closes, its failure re-opens.
 *
 * Errors thrown by the operation are rethrown unchanged.
 */
export class CircuitBreaker {
    private state: BreakerState = { status: 'CLOSED', consecutiveFailures: 0, openedAt: null };
    private readonly failureThreshold: number;
    private readonly recoveryTimeoutMs: number;
    private readonly isFailure: (error: unknown) => boolean;
    private readonly onStateChange?: CircuitBreakerOptions['onStateChange'];
    private readonly clock: () => number;

    constructor(
        public readonly operationKey: string,
        options?: CircuitBreakerOptions
    ) {
        this.failureThreshold = options?.failureThreshold ?? 5;
        this.recoveryTimeoutMs = options?.recoveryTimeoutMs ?? 60000;
        this.isFailure = options?.isFailure ?? (() => true);
        this.onStateChange = options?.onStateChange;
        this.clock = options?.clock ?? (() => Date.now());

        if (this.failureThreshold < 1) {
            throw new RangeError('failureThreshold must be at least 1');
        }
    }

    /**
     * @param countsAsFailure narrows the configured predicate for this call only
     */
    async call<T>(operation: () => Promise<T>, countsAsFailure?: (error: unknown) => boolean): Promise<T> {
        this.beforeCall();

        let result: T;
        try {
            result = await operation();
        } catch (error) {
            if (this.isFailure(error) && (countsAsFailure?.(error) ?? true)) {
                this.onFailure();
            } else {
                this.onNeutral();
            }
            throw error;
        }

        this.onSuccess();
        return result;
    }

    getState(): BreakerState {
        return { ...this.state };
    }

    /**
     * Forces the circuit closed (operator override).
     */
    reset(): void {
        this.transition('CLOSED');
        this.state = { status: 'CLOSED', consecutiveFailures: 0, openedAt: null };
    }

    private beforeCall(): void {
        const { status, openedAt } = this.state;

        if (status === 'HALF_OPEN') {
            // A trial is already in flight
            throw new BreakerOpenError(this.operationKey, this.recoveryTimeoutMs);
        }

        if (status === 'OPEN' && openedAt !== null) {
            const elapsed = this.clock() - openedAt;
            if (elapsed < this.recoveryTimeoutMs) {
                throw new BreakerOpenError(this.operationKey, this.recoveryTimeoutMs - elapsed);
            }
            this.transition('HALF_OPEN');
            this.state = { ...this.state, status: 'HALF_OPEN' };
            console.log(`[CircuitBreaker] ${this.operationKey} entering HALF_OPEN, allowing trial call`);
        }
    }

    private onSuccess(): void {
        if (this.state.status === 'HALF_OPEN') {
            console.log(`[CircuitBreaker] ${this.operationKey} recovered, entering CLOSED`);
        }
        this.transition('CLOSED');
        this.state = { status: 'CLOSED', consecutiveFailures: 0, openedAt: null };
    }

    private onFailure(): void {
        const consecutiveFailures = this.state.consecutiveFailures + 1;

        if (this.state.status === 'HALF_OPEN' || consecutiveFailures >= this.failureThreshold) {
            this.transition('OPEN');
            this.state = { status: 'OPEN', consecutiveFailures, openedAt: this.clock() };
            console.error(
                `[CircuitBreaker] ${this.operationKey} OPEN after ${consecutiveFailures} consecutive failures`
            );
            return;
        }

        this.state = { ...this.state, consecutiveFailures };
    }

    /**
     * An error the predicate ignores: a trial that ends this way releases HALF_OPEN back to OPEN
     * without restarting the recovery clock, so the next caller can try again.
     */
    private onNeutral(): void {
        if (this.state.status === 'HALF_OPEN') {
            this.transition('OPEN');
            this.state = { ...this.state, status: 'OPEN', openedAt: this.clock() - this.recoveryTimeoutMs };
        }
    }

    private transition(to: BreakerStatus): void {
        const from = this.state.status;
        if (from !== to) {
            this.onStateChange?.(this.operationKey, from, to);
        }
    }
}

/**
 * One breaker per operation identity, created on first use with shared defaults.
 */
export class CircuitBreakerRegistry {
    private readonly breakers: Map<string, CircuitBreaker> = new Map();

    constructor(private readonly defaults: CircuitBreakerOptions = {}) { }

    get(operationKey: string, overrides?: CircuitBreakerOptions): CircuitBreaker {
        let breaker = this.breakers.get(operationKey);
        if (!breaker) {
            breaker = new CircuitBreaker(operationKey, { ...this.defaults, ...overrides });
            this.breakers.set(operationKey, breaker);
        }
        return breaker;
    }

    snapshot(): Record<string, BreakerState> {
        const result: Record<string, BreakerState> = {};
        for (const [key, breaker] of this.breakers) {
            result[key] = breaker.getState();
        }
        return result;
    }
}
