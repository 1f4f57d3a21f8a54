import type { DiscoveryClient, InstanceRecord } from './types';

// ── In-memory discovery backend ─────────────────────────────────
//
// Holds instance records per service id. Used by the demo and the
// tests; a real deployment plugs its registry client in instead.
// fail() makes every lookup reject until recover() is called.

export class StaticDiscoveryClient implements DiscoveryClient {
    private instances = new Map<string, unknown[]>();
    private failure: Error | null = null;
    public lookups = 0;

    constructor(initial: Record<string, InstanceRecord[]> = {}) {
        for (const [serviceId, records] of Object.entries(initial)) {
            this.setInstances(serviceId, records);
        }
    }

    setInstances(serviceId: string, records: readonly unknown[]): void {
        this.instances.set(serviceId.toLowerCase(), [...records]);
    }

    fail(error: Error = new Error('discovery backend unreachable')): void {
        this.failure = error;
    }

    recover(): void {
        this.failure = null;
    }

    async getInstances(serviceId: string): Promise<unknown[]> {
        this.lookups++;
        if (this.failure) throw this.failure;
        return [...(this.instances.get(serviceId.toLowerCase()) ?? [])];
    }
}
