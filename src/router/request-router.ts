import { InvalidRequestError } from '../errors';
import type { FilterContext } from '../filters/types';
import type { ServerChooser } from '../load-balancer/load-balancer';
import type { Server } from '../servers/types';

// =================================================================
// REQUEST ROUTER
// =================================================================
//
// Turns a request addressed to a logical client into one addressed
// to a concrete server:
//
//   http://orders/api/x?id=1   + chosen 10.0.0.7:8443
//   ────────────────────────────────────────────────
//   https://10.0.0.7:8443/api/x?id=1
//
// Host and port are replaced; user info, path, query and fragment
// are kept. The scheme is upgraded (http → https, ws → wss) when the
// chosen server is secure, and is never downgraded.
// =================================================================

export interface OutgoingRequest {
    uri: string;
    method?: string;
    headers?: Record<string, string>;
}

export interface RoutedRequest extends OutgoingRequest {
    server: Server;
    originalUri: string;
    /** True when the scheme was upgraded to its secure variant */
    upgraded: boolean;
}

const SECURE_VARIANTS: Record<string, string> = {
    http: 'https',
    ws: 'wss',
};

const SECURE_SCHEMES = new Set(Object.values(SECURE_VARIANTS));

/**
 * Whether `server` advertises a secure port.
 *
 * Discovery servers say so explicitly. For plain servers the only hint is
 * the port number: one ending in "443" (443, 8443, ...) is taken as secure.
 * That fallback is a best-effort guess, not a guarantee.
 */
export function isSecure(server: Server): boolean {
    switch (server.kind) {
    case 'discovery':
        return server.securePortEnabled;
    case 'plain':
        return String(server.port).endsWith('443');
    }
}

export function isSecureScheme(scheme: string): boolean {
    return SECURE_SCHEMES.has(scheme.toLowerCase());
}

function parseUri(uri: string): URL {
    try {
        return new URL(uri);
    } catch {
        throw new InvalidRequestError(`Cannot route unparsable URI "${uri}"`, { uri });
    }
}

/**
 * Rebuild `original` so it targets `server`. The port is always written
 * out, even when it is the scheme's default.
 */
export function reconstructUri(server: Server, original: string): { uri: string; upgraded: boolean } {
    const url = parseUri(original);
    let scheme = url.protocol.replace(/:$/, '').toLowerCase();
    let upgraded = false;

    const secureVariant = SECURE_VARIANTS[scheme];
    if (!isSecureScheme(scheme) && secureVariant !== undefined && isSecure(server)) {
        scheme = secureVariant;
        upgraded = true;
    }

    const userInfo = url.username
        ? `${url.username}${url.password ? `:${url.password}` : ''}@`
        : '';
    const host = server.host.includes(':') ? `[${server.host}]` : server.host;

    return {
        uri: `${scheme}://${userInfo}${host}:${server.port}${url.pathname}${url.search}${url.hash}`,
        upgraded,
    };
}

export class RequestRouter {
    /**
     * Pick a server and retarget `request` at it. NoAvailableServerError from
     * the chooser propagates; the original, unroutable URI is never returned.
     */
    route(request: OutgoingRequest, chooser: ServerChooser, context?: FilterContext): RoutedRequest {
        // Reject a bad URI before spending a selection on it
        parseUri(request.uri);

        const server = chooser.choose(context);
        const { uri, upgraded } = reconstructUri(server, request.uri);

        return {
            ...request,
            uri,
            server,
            originalUri: request.uri,
            upgraded,
        };
    }
}
