// =================================================================
// CIRCUIT BREAKER
// =================================================================
//
// Tracks the outcome of real requests to ONE server and stops the
// load balancer from picking it while it keeps failing.
//
//   CLOSED ── failureThreshold failures within monitorWindowMs ──► OPEN
//   OPEN   ── resetTimeoutMs elapsed ──────────────────────────► HALF_OPEN
//   HALF_OPEN ── success ──► CLOSED
//   HALF_OPEN ── failure ──► OPEN
//
// isAvailable() only reads state; tryAcquire() also spends one of
// the halfOpenMax trial slots.
// =================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
    failureThreshold: number;   // Failures before opening
    resetTimeoutMs: number;     // Ms before trying half-open
    monitorWindowMs: number;    // Ms window to count failures
    halfOpenMax: number;        // Trial requests allowed in half-open
    now?: () => number;
}

export interface CircuitTransition {
    from: CircuitState;
    to: CircuitState;
    at: number;
}

export class CircuitBreaker {
    private state: CircuitState = 'CLOSED';
    private failures: number[] = []; // Timestamps of recent failures
    private openedAt = 0;
    private halfOpenAttempts = 0;
    private readonly now: () => number;

    private stats: { totalSuccesses: number; totalFailures: number; transitions: CircuitTransition[] } = {
        totalSuccesses: 0,
        totalFailures: 0,
        transitions: [],
    };

    constructor(
        public readonly name: string,
        private readonly options: CircuitBreakerOptions,
    ) {
        this.now = options.now ?? Date.now;
    }

    /** Read-only check: may this server be picked right now? */
    isAvailable(): boolean {
        const state = this.getState();
        return state === 'CLOSED' || (state === 'HALF_OPEN' && this.halfOpenAttempts < this.options.halfOpenMax);
    }

    /** Claim permission for one request (spends a half-open trial slot). */
    tryAcquire(): boolean {
        switch (this.getState()) {
        case 'CLOSED':
            return true;
        case 'OPEN':
            return false;
        case 'HALF_OPEN':
            if (this.halfOpenAttempts < this.options.halfOpenMax) {
                this.halfOpenAttempts++;
                return true;
            }
            return false;
        }
    }

    onSuccess(): void {
        this.stats.totalSuccesses++;

        if (this.getState() === 'HALF_OPEN') {
            // Trial passed, server is healthy again
            this.failures = [];
            this.transitionTo('CLOSED');
        }
    }

    onFailure(): void {
        this.stats.totalFailures++;
        const now = this.now();

        switch (this.getState()) {
        case 'CLOSED':
            this.failures.push(now);
            this.failures = this.failures.filter(t => now - t < this.options.monitorWindowMs);

            if (this.failures.length >= this.options.failureThreshold) {
                this.openedAt = now;
                this.transitionTo('OPEN');
            }
            break;

        case 'HALF_OPEN':
            // Trial failed, back off again
            this.openedAt = now;
            this.transitionTo('OPEN');
            break;

        case 'OPEN':
            break;
        }
    }

    getState(): CircuitState {
        if (this.state === 'OPEN' && this.now() - this.openedAt >= this.options.resetTimeoutMs) {
            this.halfOpenAttempts = 0;
            this.transitionTo('HALF_OPEN');
        }
        return this.state;
    }

    getStats() {
        return {
            name: this.name,
            state: this.getState(),
            recentFailures: this.failures.length,
            totalSuccesses: this.stats.totalSuccesses,
            totalFailures: this.stats.totalFailures,
            transitions: this.stats.transitions.slice(-10),
        };
    }

    reset(): void {
        this.state = 'CLOSED';
        this.failures = [];
        this.halfOpenAttempts = 0;
        this.openedAt = 0;
        this.stats = { totalSuccesses: 0, totalFailures: 0, transitions: [] };
    }

    private transitionTo(next: CircuitState): void {
        const from = this.state;
        this.state = next;
        this.stats.transitions.push({ from, to: next, at: this.now() });

        console.log(`[CB:${this.name}] ${from} → ${next}`);
    }
}
