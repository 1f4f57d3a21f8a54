import { discoveryServer, type DiscoveryServer, type Server } from '../servers/types';
import { InstanceRecordSchema, type DiscoveryClient, type ServerListSource } from './types';

export interface DiscoveryServerListOptions {
    serviceId: string;
    /** Address instances on their secure port when they advertise one */
    useSecurePort?: boolean;
}

/**
 * Pulls the member list for one service id from the discovery backend.
 * Only instances reporting UP are kept; malformed records are skipped.
 * Backend failures propagate so the registry can fall back to its last
 * snapshot.
 */
export class DiscoveryServerList implements ServerListSource {
    name = 'discovery';

    constructor(
        private readonly client: DiscoveryClient,
        private readonly options: DiscoveryServerListOptions,
    ) {}

    async getServers(signal?: AbortSignal): Promise<Server[]> {
        const records = await this.client.getInstances(this.options.serviceId, signal);
        const servers: DiscoveryServer[] = [];

        for (const raw of records) {
            const parsed = InstanceRecordSchema.safeParse(raw);
            if (!parsed.success) {
                const issue = parsed.error.issues[0];
                console.warn(
                    `[discovery:${this.options.serviceId}] Skipping malformed instance: ` +
                    `${issue.path.join('.')} ${issue.message}`
                );
                continue;
            }

            const record = parsed.data;
            if (record.status !== 'UP') continue;

            const port = this.options.useSecurePort && record.securePortEnabled && record.securePort !== undefined
                ? record.securePort
                : record.port;

            servers.push(discoveryServer({
                host: record.host,
                port,
                zone: record.zone ?? record.metadata.zone,
                instanceId: record.instanceId,
                securePortEnabled: record.securePortEnabled,
                securePort: record.securePort,
                metadata: record.metadata,
            }));
        }

        return servers;
    }
}
