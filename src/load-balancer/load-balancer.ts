import { parseClientConfig, type ClientConfig } from '../config/client-config';
import { NoAvailableServerError } from '../errors';
import type { FilterContext } from '../filters/types';
import { ServerRegistry, type RegistrySnapshot, type StaleEvent } from '../registry/server-registry';
import type { Server } from '../servers/types';
import {
    buildStrategies,
    type LoadBalancerStrategies,
    type StrategyDependencies,
} from './strategies';

// =================================================================
// CLIENT LOAD BALANCER
// =================================================================
//
// One instance per logical client name. choose() runs the pipeline
// against the most recently completed registry snapshot:
//
//   snapshot ──► filter.apply ──► drop !probe.isReachable ──► rule.choose
//      │              │                    │
//      empty          empty                empty
//      ▼              ▼                    ▼
//   NoAvailableServer(empty-registry | filtered-out | unreachable)
//
// choose() is synchronous and never waits on a refresh; refreshes
// and health probes run on their own timers.
// =================================================================

/** Anything that can pick a server (what the request router needs). */
export interface ServerChooser {
    choose(context?: FilterContext): Server;
}

export interface LoadBalancerDescription {
    name: string;
    source: string;
    filter: string;
    probe: string;
    rule: string;
    servers: number;
    version: number;
    stale: boolean;
    running: boolean;
}

export class ClientLoadBalancer implements ServerChooser {
    readonly name: string;
    private readonly registry: ServerRegistry;
    private pingTimer?: NodeJS.Timeout;

    constructor(
        readonly config: ClientConfig,
        private readonly strategies: LoadBalancerStrategies,
        deps: Pick<StrategyDependencies, 'now'> = {},
    ) {
        this.name = config.name;
        this.registry = new ServerRegistry(config.name, strategies.source, {
            intervalMs: config.refreshIntervalMs,
            timeoutMs: config.refreshTimeoutMs,
            now: deps.now,
        });

        // Probe new snapshots in the background, never on choose()
        this.registry.onRefresh((snapshot) => this.probeInBackground(snapshot.servers));
    }

    /**
     * Start refresh (and ping) timers and run the first refresh.
     * Resolves once the first snapshot attempt has completed.
     */
    async start(): Promise<void> {
        this.registry.start();

        const probe = this.strategies.probe;
        if (probe.probe && probe.intervalMs && !this.pingTimer) {
            this.pingTimer = setInterval(() => {
                this.probeInBackground(this.registry.getServers());
            }, probe.intervalMs);
        }

        await this.registry.refresh();
    }

    stop(): void {
        this.registry.stop();
        if (this.pingTimer) {
            clearInterval(this.pingTimer);
            this.pingTimer = undefined;
        }
    }

    choose(context: FilterContext = {}): Server {
        // One read of the snapshot reference for the whole selection
        const snapshot = this.registry.getSnapshot();
        if (snapshot.servers.length === 0) {
            throw new NoAvailableServerError(this.name, 'empty-registry');
        }

        const { filter, probe, rule } = this.strategies;

        const eligible = filter.apply(snapshot.servers, context);
        if (eligible.length === 0) {
            throw new NoAvailableServerError(this.name, 'filtered-out');
        }

        const reachable = eligible.filter(server => probe.isReachable(server));
        if (reachable.length === 0) {
            throw new NoAvailableServerError(this.name, 'unreachable');
        }

        const server = rule.choose(reachable, { clientName: this.name, eligible });
        probe.onServerChosen?.(server);

        return server;
    }

    /** Report how a request to `server` went (feeds circuit-breaking probes). */
    recordOutcome(server: Server, succeeded: boolean): void {
        this.strategies.probe.onRequestComplete?.(server, succeeded);
    }

    refresh(): Promise<readonly Server[]> {
        return this.registry.refresh();
    }

    getSnapshot(): RegistrySnapshot {
        return this.registry.getSnapshot();
    }

    onStale(handler: (event: StaleEvent) => void): void {
        this.registry.onStale(handler);
    }

    describe(): LoadBalancerDescription {
        const snapshot = this.registry.getSnapshot();
        return {
            name: this.name,
            source: this.strategies.source.name,
            filter: this.strategies.filter.name,
            probe: this.strategies.probe.name,
            rule: this.strategies.rule.name,
            servers: snapshot.servers.length,
            version: snapshot.version,
            stale: snapshot.stale,
            running: this.registry.isRunning(),
        };
    }

    private probeInBackground(servers: readonly Server[]): void {
        const probe = this.strategies.probe;
        if (!probe.probe) return;

        probe.probe(servers).catch((err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[lb:${this.name}] Health probe "${probe.name}" failed: ${message}`);
        });
    }
}

/**
 * Validate `input` and build a load balancer from it. Any of the four
 * strategies can be swapped out through `overrides`.
 * Throws InvalidConfigurationError; nothing is started on failure.
 */
export function createLoadBalancer(
    input: unknown,
    overrides: Partial<LoadBalancerStrategies> = {},
    deps: StrategyDependencies = {},
): ClientLoadBalancer {
    const config = parseClientConfig(input);
    const strategies = buildStrategies(config, overrides, deps);
    return new ClientLoadBalancer(config, strategies, deps);
}
