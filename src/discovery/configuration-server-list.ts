import { InvalidConfigurationError } from '../errors';
import { plainServer, type PlainServer, type Server } from '../servers/types';
import type { ServerListSource } from './types';

// =================================================================
// CONFIGURATION-BASED SERVER LIST
// =================================================================
//
// Servers written straight into the client configuration:
//
//   listOfServers: 'a.internal:8080, b.internal:8443, https://c.internal'
//
// Accepted entry forms:
//   host                 → port 80
//   host:port
//   scheme://host[:port] → port 80 for http, 443 for https
//   [::1]:port           → IPv6 literal
//
// The list is fixed, so every refresh returns the same snapshot.
// =================================================================

const DEFAULT_PORTS: Record<string, number> = { http: 80, https: 443, ws: 80, wss: 443 };

export function parseServerEntry(entry: string): PlainServer {
    let rest = entry.trim();
    let defaultPort = 80;

    const schemeMatch = /^([a-z][a-z0-9+.-]*):\/\//i.exec(rest);
    if (schemeMatch) {
        defaultPort = DEFAULT_PORTS[schemeMatch[1].toLowerCase()] ?? 80;
        rest = rest.slice(schemeMatch[0].length);
    }

    // Drop any path after the authority
    const slash = rest.indexOf('/');
    if (slash >= 0) rest = rest.slice(0, slash);

    let host: string;
    let portText: string | undefined;

    if (rest.startsWith('[')) {
        const close = rest.indexOf(']');
        if (close < 0) throw new InvalidConfigurationError(`Invalid server entry "${entry}": unclosed IPv6 bracket`);
        host = rest.slice(1, close);
        const after = rest.slice(close + 1);
        if (after.length > 0) {
            if (!after.startsWith(':')) throw new InvalidConfigurationError(`Invalid server entry "${entry}"`);
            portText = after.slice(1);
        }
    } else {
        const colon = rest.lastIndexOf(':');
        host = colon >= 0 ? rest.slice(0, colon) : rest;
        portText = colon >= 0 ? rest.slice(colon + 1) : undefined;
    }

    if (host.length === 0) throw new InvalidConfigurationError(`Invalid server entry "${entry}": missing host`);

    const port = portText === undefined ? defaultPort : Number(portText);
    if (!/^\d+$/.test(portText ?? String(defaultPort)) || port < 1 || port > 65535) {
        throw new InvalidConfigurationError(`Invalid server entry "${entry}": bad port "${portText}"`);
    }

    return plainServer(host, port);
}

export class ConfigurationServerList implements ServerListSource {
    name = 'configuration';
    private readonly servers: readonly Server[];

    constructor(entries: readonly string[]) {
        this.servers = Object.freeze(entries.map(parseServerEntry));
    }

    async getServers(): Promise<Server[]> {
        return [...this.servers];
    }
}
