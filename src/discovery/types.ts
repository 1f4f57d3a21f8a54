import { z } from 'zod';
import type { Server } from '../servers/types';

// =================================================================
// DISCOVERY TYPES
// =================================================================
//
// Two layers:
//
//   DiscoveryClient   → the remote backend. Returns raw instance
//                       records for a service id, untrusted shape.
//   ServerListSource  → what a registry pulls from. Returns the
//                       full current list of Servers for ONE client.
//
// A registry only ever sees ServerListSource, so a static list and
// a discovery backend are interchangeable.
// =================================================================

export const InstanceRecordSchema = z.object({
    instanceId: z.string().min(1),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    securePort: z.number().int().min(1).max(65535).optional(),
    securePortEnabled: z.boolean().default(false),
    zone: z.string().min(1).optional(),
    status: z.enum(['UP', 'DOWN', 'STARTING', 'OUT_OF_SERVICE', 'UNKNOWN']).default('UP'),
    metadata: z.record(z.string()).default({}),
});

export type InstanceRecord = z.input<typeof InstanceRecordSchema>;

export interface DiscoveryClient {
    /** Raw member list for a service id. May reject when the backend is unreachable. */
    getInstances(serviceId: string, signal?: AbortSignal): Promise<unknown[]>;
}

export interface ServerListSource {
    /** Source name, for logs */
    name: string;

    /** Full replacement list of candidate servers */
    getServers(signal?: AbortSignal): Promise<Server[]>;
}
