/**
 * Token bucket rate limiter with one bucket per resource key (usually a remote host).
 *
 * Buckets refill lazily on access; there is no timer refilling them in the background.
 * Bucket state is only mutated synchronously, so no lock is ever held across an await.
 * Each bucket keeps its own FIFO queue of waiting acquirers, so a saturated host never
 * delays callers throttled on a different host.
 */

export interface RateBudget {
    capacity: number;
    tokens: number;
    /** Tokens per second */
    refillRate: number;
    lastRefillAt: number;
}

export interface RateLimiterOptions {
    /** Default requests per second for buckets created on first use (default: 5) */
    defaultRate?: number;
    /** Default burst size; falls back to the rate (minimum 1) */
    defaultCapacity?: number;
    /** Milliseconds clock, injectable for tests */
    clock?: () => number;
}

interface Waiter {
    cost: number;
    resolve: () => void;
}

interface Bucket {
    budget: RateBudget;
    waiters: Waiter[];
    timer: NodeJS.Timeout | null;
}

export class RateLimiter {
    private readonly buckets: Map<string, Bucket> = new Map();
    private readonly defaultRate: number;
    private readonly defaultCapacity?: number;
    private readonly clock: () => number;

    constructor(options?: RateLimiterOptions) {
        this.defaultRate = options?.defaultRate ?? 5;
        this.defaultCapacity = options?.defaultCapacity;
        this.clock = options?.clock ?? (() => Date.now());

        if (this.defaultRate <= 0) {
            throw new RangeError('defaultRate must be positive');
        }
    }

    /**
     * Waits until `cost` tokens are available for the resource, then consumes them.
     * Never fails once the arguments are valid: a saturated bucket only delays.
     */
    async acquire(resourceKey: string, cost: number = 1): Promise<void> {
        const bucket = this.getBucket(resourceKey);
        this.assertCost(bucket, resourceKey, cost);

        if (bucket.waiters.length === 0 && this.consume(bucket, cost)) {
            return;
        }

        await new Promise<void>((resolve) => {
            bucket.waiters.push({ cost, resolve });
            this.schedule(bucket);
        });
    }

    /**
     * Consumes tokens only if they are available right now. Never waits.
     * Returns false while earlier acquirers are queued on the bucket.
     */
    tryAcquire(resourceKey: string, cost: number = 1): boolean {
        const bucket = this.getBucket(resourceKey);
        this.assertCost(bucket, resourceKey, cost);

        if (bucket.waiters.length > 0) {
            return false;
        }
        return this.consume(bucket, cost);
    }

    /**
     * Overrides rate (and optionally capacity) for one resource. Takes effect immediately.
     * The current token count is kept as is, clamped to the new capacity.
     */
    setRate(resourceKey: string, refillRate: number, capacity?: number): void {
        if (refillRate <= 0) {
            throw new RangeError(`Rate for ${resourceKey} must be positive`);
        }
        const bucket = this.getBucket(resourceKey);
        this.refill(bucket.budget);

        bucket.budget.refillRate = refillRate;
        bucket.budget.capacity = capacity ?? defaultCapacityFor(refillRate);
        bucket.budget.tokens = Math.min(bucket.budget.tokens, bucket.budget.capacity);

        // Waiters may be due sooner (or later) under the new rate
        if (bucket.timer) {
            clearTimeout(bucket.timer);
            bucket.timer = null;
        }
        this.drain(bucket);
    }

    /**
     * Refilled snapshot of a bucket's budget.
     */
    getBudget(resourceKey: string): RateBudget {
        const bucket = this.getBucket(resourceKey);
        this.refill(bucket.budget);
        return { ...bucket.budget };
    }

    pendingAcquires(resourceKey: string): number {
        return this.buckets.get(resourceKey)?.waiters.length ?? 0;
    }

    resourceKeys(): string[] {
        return Array.from(this.buckets.keys());
    }

    private getBucket(resourceKey: string): Bucket {
        let bucket = this.buckets.get(resourceKey);
        if (!bucket) {
            const capacity = this.defaultCapacity ?? defaultCapacityFor(this.defaultRate);
            bucket = {
                budget: {
                    capacity,
                    tokens: capacity,
                    refillRate: this.defaultRate,
                    lastRefillAt: this.clock(),
                },
                waiters: [],
                timer: null,
            };
            this.buckets.set(resourceKey, bucket);
        }
        return bucket;
    }

    private assertCost(bucket: Bucket, resourceKey: string, cost: number): void {
        if (!(cost > 0)) {
            throw new RangeError(`Token cost must be positive, got ${cost}`);
        }
        if (cost > bucket.budget.capacity) {
            throw new RangeError(
                `Token cost ${cost} exceeds capacity ${bucket.budget.capacity} for ${resourceKey}`
            );
        }
    }

    private refill(budget: RateBudget): void {
        const now = this.clock();
        const elapsedSeconds = Math.max(0, now - budget.lastRefillAt) / 1000;
        budget.tokens = Math.min(budget.capacity, budget.tokens + elapsedSeconds * budget.refillRate);
        budget.lastRefillAt = now;
    }

    private consume(bucket: Bucket, cost: number): boolean {
        this.refill(bucket.budget);
        if (bucket.budget.tokens >= cost) {
            bucket.budget.tokens -= cost;
            return true;
        }
        return false;
    }

    /**
     * Hands tokens to queued waiters in order, then arms a timer for the next one.
     */
    private drain(bucket: Bucket): void {
        while (bucket.waiters.length > 0) {
            const next = bucket.waiters[0];
            // A setRate() may have shrunk capacity below a queued cost; a full bucket admits it.
            if (!this.consume(bucket, Math.min(next.cost, bucket.budget.capacity))) {
                break;
            }
            bucket.waiters.shift();
            next.resolve();
        }
        this.schedule(bucket);
    }

    private schedule(bucket: Bucket): void {
        if (bucket.timer || bucket.waiters.length === 0) {
            return;
        }
        this.refill(bucket.budget);
        const needed = Math.min(bucket.waiters[0].cost, bucket.budget.capacity);
        const deficit = Math.max(0, needed - bucket.budget.tokens);
        const waitMs = Math.max(1, Math.ceil((deficit / bucket.budget.refillRate) * 1000));

        bucket.timer = setTimeout(() => {
            bucket.timer = null;
            this.drain(bucket);
        }, waitMs);
    }
}

function defaultCapacityFor(rate: number): number {
    return Math.max(1, Math.floor(rate));
}
