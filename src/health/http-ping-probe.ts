import http from 'http';
import https from 'https';
import { ProbeTimeoutError } from '../errors';
import { serverKey, type Server } from '../servers/types';
import type { HealthProbe } from './types';

// =================================================================
// HTTP PING PROBE
// =================================================================
//
// GETs a health path on every server, OFF the selection path:
//
//   registry refresh / ping timer ──► probe(servers) ──► cache
//   choose() ──► isReachable(server) ──► cache lookup (no I/O)
//
//   200..299       → reachable
//   other status   → unreachable
//   socket error   → unreachable
//   not answered   → unreachable (ProbeTimeout recorded,
//   in timeoutMs     never thrown)
//
// A result younger than cacheTtlMs is reused instead of re-probing.
// Servers never probed yet count as reachable.
// =================================================================

export interface HttpPingProbeOptions {
    path: string;
    timeoutMs: number;
    cacheTtlMs: number;
    intervalMs: number;
    secure: boolean;
    now?: () => number;
}

export interface ProbeResult {
    reachable: boolean;
    checkedAt: number;
    statusCode?: number;
    error?: Error;
}

export class HttpPingProbe implements HealthProbe {
    name = 'http-ping';
    readonly intervalMs: number;
    private results = new Map<string, ProbeResult>();
    private readonly now: () => number;

    constructor(private readonly options: HttpPingProbeOptions) {
        this.intervalMs = options.intervalMs;
        this.now = options.now ?? Date.now;
    }

    isReachable(server: Server): boolean {
        return this.results.get(serverKey(server))?.reachable ?? true;
    }

    getLastResult(server: Server): ProbeResult | undefined {
        return this.results.get(serverKey(server));
    }

    async probe(servers: readonly Server[]): Promise<void> {
        const present = new Set(servers.map(serverKey));
        for (const key of this.results.keys()) {
            if (!present.has(key)) this.results.delete(key);
        }

        const now = this.now();
        const due = servers.filter((server) => {
            const last = this.results.get(serverKey(server));
            return !last || now - last.checkedAt >= this.options.cacheTtlMs;
        });

        await Promise.all(due.map(async (server) => {
            const result = await this.ping(server);
            const key = serverKey(server);
            const previous = this.results.get(key);

            if (previous && previous.reachable !== result.reachable) {
                console.log(`[probe:${key}] ${result.reachable ? 'UP' : 'DOWN'}${result.error ? ` (${result.error.message})` : ''}`);
            }
            this.results.set(key, result);
        }));
    }

    private ping(server: Server): Promise<ProbeResult> {
        const transport = this.options.secure ? https : http;

        return new Promise<ProbeResult>((resolve) => {
            let deadline: NodeJS.Timeout | undefined;
            const settle = (result: ProbeResult): void => {
                clearTimeout(deadline);
                resolve(result);
            };

            const req = transport.request({
                hostname: server.host,
                port: server.port,
                path: this.options.path,
                method: 'GET',
            }, (res) => {
                const statusCode = res.statusCode ?? 0;
                res.resume();
                settle({
                    reachable: statusCode >= 200 && statusCode < 300,
                    checkedAt: this.now(),
                    statusCode,
                });
            });

            // Hard deadline, not a socket idle timeout: a server that keeps
            // trickling bytes still fails closed after timeoutMs
            deadline = setTimeout(() => {
                const error = new ProbeTimeoutError(serverKey(server), this.options.timeoutMs);
                req.destroy(error);
                settle({ reachable: false, checkedAt: this.now(), error });
            }, this.options.timeoutMs);

            req.on('error', (err) => {
                settle({ reachable: false, checkedAt: this.now(), error: err });
            });

            req.end();
        });
    }
}
