// =================================================================
// SERVER MODEL
// =================================================================
//
// A candidate endpoint comes in two shapes:
//
//   plain      → host + port (static lists, hand-written config)
//   discovery  → host + port + instance metadata from the discovery
//                backend, including whether a secure port is enabled
//
// Consumers switch on `kind` instead of probing for optional fields.
// Servers are frozen: a refresh produces new objects, never edits.
// =================================================================

export const UNKNOWN_ZONE = 'unknown';

export interface PlainServer {
    readonly kind: 'plain';
    readonly host: string;
    readonly port: number;
    readonly zone?: string;
}

export interface DiscoveryServer {
    readonly kind: 'discovery';
    readonly host: string;
    readonly port: number;
    readonly zone?: string;
    readonly instanceId: string;
    readonly securePortEnabled: boolean;
    readonly securePort?: number;
    readonly metadata: Readonly<Record<string, string>>;
}

export type Server = PlainServer | DiscoveryServer;

export function plainServer(host: string, port: number, zone?: string): PlainServer {
    return Object.freeze({ kind: 'plain' as const, host, port, ...(zone !== undefined ? { zone } : {}) });
}

export function discoveryServer(fields: Omit<DiscoveryServer, 'kind'>): DiscoveryServer {
    return Object.freeze({
        ...fields,
        kind: 'discovery' as const,
        metadata: Object.freeze({ ...fields.metadata }),
    });
}

/** `host:port`, bracketing IPv6 literals. */
export function serverKey(server: Server): string {
    const host = server.host.includes(':') ? `[${server.host}]` : server.host;
    return `${host}:${server.port}`;
}

export function serverZone(server: Server): string {
    return server.zone ?? UNKNOWN_ZONE;
}
