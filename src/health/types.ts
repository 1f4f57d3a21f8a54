import type { Server } from '../servers/types';

export interface HealthProbe {
    /** Probe name, for logs and describe() */
    name: string;

    /** Synchronous read of the latest known state. Must not do I/O. */
    isReachable(server: Server): boolean;

    /** Re-check servers in the background (called after each refresh and on the ping timer) */
    probe?(servers: readonly Server[]): Promise<void>;

    /** Interval for the ping timer, when probe() exists */
    intervalMs?: number;

    /** The load balancer picked this server for a request */
    onServerChosen?(server: Server): void;

    /** Feedback from real traffic (for circuit-breaking probes) */
    onRequestComplete?(server: Server, succeeded: boolean): void;
}
