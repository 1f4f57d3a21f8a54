import { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from '../circuit-breaker/circuit-breaker';
import { serverKey, type Server } from '../servers/types';
import type { HealthProbe } from './types';

// =================================================================
// CIRCUIT BREAKER PROBE
// =================================================================
//
// Health judged from real traffic instead of pings. Each server
// gets its own breaker; if server A keeps failing its circuit opens
// and A drops out of selection, while B and C keep serving.
//
// The gateway reports outcomes through the load balancer:
//   lb.recordOutcome(server, ok) ──► onRequestComplete ──► breaker
//
// Breakers of servers that leave the registry are dropped on the
// next refresh.
// =================================================================

export class CircuitBreakerProbe implements HealthProbe {
    name = 'circuit-breaker';
    private breakers = new Map<string, CircuitBreaker>();

    constructor(private readonly options: CircuitBreakerOptions) {}

    isReachable(server: Server): boolean {
        return this.breakers.get(serverKey(server))?.isAvailable() ?? true;
    }

    /** Called with each new snapshot: drops breakers of servers that left. */
    async probe(servers: readonly Server[]): Promise<void> {
        const present = new Set(servers.map(serverKey));
        for (const key of this.breakers.keys()) {
            if (!present.has(key)) this.breakers.delete(key);
        }
    }

    onServerChosen(server: Server): void {
        this.breakerFor(server).tryAcquire();
    }

    onRequestComplete(server: Server, succeeded: boolean): void {
        const breaker = this.breakerFor(server);
        if (succeeded) breaker.onSuccess();
        else breaker.onFailure();
    }

    getState(server: Server): CircuitState {
        return this.breakers.get(serverKey(server))?.getState() ?? 'CLOSED';
    }

    getStats() {
        return [...this.breakers.values()].map(b => b.getStats());
    }

    private breakerFor(server: Server): CircuitBreaker {
        const key = serverKey(server);
        let breaker = this.breakers.get(key);
        if (!breaker) {
            breaker = new CircuitBreaker(key, this.options);
            this.breakers.set(key, breaker);
        }
        return breaker;
    }
}
