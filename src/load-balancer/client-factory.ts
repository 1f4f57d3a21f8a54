import type { DiscoveryClient } from '../discovery/types';
import { InvalidConfigurationError } from '../errors';
import { RequestRouter, type OutgoingRequest, type RoutedRequest } from '../router/request-router';
import { createLoadBalancer, type ClientLoadBalancer, type LoadBalancerDescription } from './load-balancer';
import type { LoadBalancerStrategies } from './strategies';

// =================================================================
// CLIENT FACTORY
// =================================================================
//
// Owns every named client of the process:
//
//   factory.getLoadBalancer('orders')   ← built + started on first use
//   factory.getLoadBalancer('orders')   ← same instance afterwards
//   factory.close()                     ← stops every timer
//
// Each name gets its own registry snapshot and probe cache.
// =================================================================

export interface ClientFactoryOptions {
    /** Raw configuration per client name; `name` is filled in from the key. */
    clients: Record<string, Record<string, unknown>>;
    discovery?: DiscoveryClient;
    /** Per-client strategy replacements */
    strategies?: Record<string, Partial<LoadBalancerStrategies>>;
    now?: () => number;
}

export class ClientFactory {
    private balancers = new Map<string, Promise<ClientLoadBalancer>>();
    private built: ClientLoadBalancer[] = [];
    private readonly router = new RequestRouter();
    private closed = false;

    constructor(private readonly options: ClientFactoryOptions) {}

    has(name: string): boolean {
        return Object.hasOwn(this.options.clients, name);
    }

    names(): string[] {
        return Object.keys(this.options.clients);
    }

    /**
     * The load balancer for `name`. The first call builds it and waits for
     * its first registry refresh; concurrent first calls share that build.
     */
    getLoadBalancer(name: string): Promise<ClientLoadBalancer> {
        if (this.closed) {
            return Promise.reject(new InvalidConfigurationError('Client factory is closed'));
        }

        let pending = this.balancers.get(name);
        if (!pending) {
            pending = this.build(name);
            this.balancers.set(name, pending);
            // A failed build is not cached, so a later call can retry
            pending.catch(() => this.balancers.delete(name));
        }
        return pending;
    }

    async route(name: string, request: OutgoingRequest): Promise<RoutedRequest> {
        const lb = await this.getLoadBalancer(name);
        return this.router.route(request, lb);
    }

    describe(): LoadBalancerDescription[] {
        return this.built.map(lb => lb.describe());
    }

    async close(): Promise<void> {
        this.closed = true;
        await Promise.allSettled(this.balancers.values());
        for (const lb of this.built) {
            lb.stop();
        }
        this.balancers.clear();
        this.built = [];
    }

    private async build(name: string): Promise<ClientLoadBalancer> {
        if (!this.has(name)) {
            throw new InvalidConfigurationError(`No configuration for client "${name}"`);
        }

        const lb = createLoadBalancer(
            { ...this.options.clients[name], name },
            this.options.strategies?.[name],
            { discovery: this.options.discovery, now: this.options.now },
        );
        this.built.push(lb);
        await lb.start();

        console.log(`[factory] Client "${name}" ready (${lb.describe().servers} servers)`);
        return lb;
    }
}
