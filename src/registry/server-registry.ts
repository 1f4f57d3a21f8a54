import { DiscoveryUnavailableError } from '../errors';
import type { ServerListSource } from '../discovery/types';
import type { Server } from '../servers/types';

// =================================================================
// SERVER REGISTRY
// =================================================================
//
// Holds the current candidate list for ONE logical client.
//
//   refresh() ──► source.getServers() ──► freeze ──► swap snapshot
//                        │
//                        └─ fails / times out ──► keep last snapshot,
//                                                 flag it stale
//
// Readers call getSnapshot() and get a frozen object: either the
// fully-old or the fully-new one, never something in between.
// A failed refresh never empties the list and never throws.
// =================================================================

export interface RegistrySnapshot {
    readonly servers: readonly Server[];
    /** Increments on every successful refresh */
    readonly version: number;
    readonly refreshedAt: number;
    /** True while the last refresh attempt failed */
    readonly stale: boolean;
}

export interface ServerRegistryOptions {
    intervalMs: number;
    timeoutMs: number;
    now?: () => number;
}

export interface StaleEvent {
    clientName: string;
    error: DiscoveryUnavailableError;
    snapshot: RegistrySnapshot;
}

export class ServerRegistry {
    private snapshot: RegistrySnapshot = Object.freeze({
        servers: Object.freeze([]),
        version: 0,
        refreshedAt: 0,
        stale: false,
    });
    private inflight: Promise<readonly Server[]> | null = null;
    private timer?: NodeJS.Timeout;
    private readonly now: () => number;

    private onRefreshHandlers: Array<(snapshot: RegistrySnapshot) => void> = [];
    private onStaleHandlers: Array<(event: StaleEvent) => void> = [];

    constructor(
        public readonly clientName: string,
        private readonly source: ServerListSource,
        private readonly options: ServerRegistryOptions,
    ) {
        this.now = options.now ?? Date.now;
    }

    getSnapshot(): RegistrySnapshot {
        return this.snapshot;
    }

    getServers(): readonly Server[] {
        return this.snapshot.servers;
    }

    /**
     * Pull a full replacement list. Concurrent callers share one pull.
     * Resolves with whatever list is current afterwards.
     */
    refresh(): Promise<readonly Server[]> {
        if (!this.inflight) {
            this.inflight = this.pull().finally(() => {
                this.inflight = null;
            });
        }
        return this.inflight;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            void this.refresh();
        }, this.options.intervalMs);
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    isRunning(): boolean {
        return this.timer !== undefined;
    }

    onRefresh(handler: (snapshot: RegistrySnapshot) => void): void {
        this.onRefreshHandlers.push(handler);
    }

    onStale(handler: (event: StaleEvent) => void): void {
        this.onStaleHandlers.push(handler);
    }

    private async pull(): Promise<readonly Server[]> {
        const controller = new AbortController();
        let timeout: NodeJS.Timeout | undefined;

        const deadline = new Promise<never>((_, reject) => {
            timeout = setTimeout(() => {
                controller.abort();
                reject(new Error(`refresh timed out after ${this.options.timeoutMs}ms`));
            }, this.options.timeoutMs);
        });

        let servers: Server[];
        try {
            servers = await Promise.race([this.source.getServers(controller.signal), deadline]);
        } catch (err) {
            this.markStale(new DiscoveryUnavailableError(this.clientName, err));
            return this.snapshot.servers;
        } finally {
            clearTimeout(timeout);
        }

        this.publish(servers);
        return this.snapshot.servers;
    }

    private publish(servers: readonly Server[]): void {
        const previous = this.snapshot;
        const next: RegistrySnapshot = Object.freeze({
            servers: Object.freeze([...servers]),
            version: previous.version + 1,
            refreshedAt: this.now(),
            stale: false,
        });

        // Single reference swap: readers see old or new, never a mix
        this.snapshot = next;

        if (previous.stale) {
            console.log(`[registry:${this.clientName}] Discovery recovered (${next.servers.length} servers)`);
        } else if (previous.servers.length !== next.servers.length) {
            console.log(
                `[registry:${this.clientName}] ${previous.servers.length} → ${next.servers.length} servers`
            );
        }
        if (next.servers.length === 0) {
            console.warn(`[registry:${this.clientName}] Source "${this.source.name}" returned no servers`);
        }

        for (const handler of this.onRefreshHandlers) {
            handler(next);
        }
    }

    private markStale(error: DiscoveryUnavailableError): void {
        const next: RegistrySnapshot = Object.freeze({ ...this.snapshot, stale: true });
        this.snapshot = next;

        console.warn(
            `[registry:${this.clientName}] ${error.message}; ` +
            `serving last snapshot v${next.version} (${next.servers.length} servers)`
        );

        for (const handler of this.onStaleHandlers) {
            handler({ clientName: this.clientName, error, snapshot: next });
        }
    }
}
