// =================================================================
// ERRORS
// =================================================================
//
// Every failure the load-balancing layer can raise carries a code,
// so callers (and the gateway) can branch without instanceof chains.
//
//   DiscoveryUnavailable  → registry keeps its last snapshot (stale)
//   NoAvailableServer     → surfaced to choose() / route() callers
//   ProbeTimeout          → server treated as unreachable, never thrown
//   InvalidConfiguration  → fatal while building a load balancer
//   InvalidRequest        → the outgoing URI could not be parsed
// =================================================================

export type LoadBalancerErrorCode =
    | 'DiscoveryUnavailable'
    | 'NoAvailableServer'
    | 'ProbeTimeout'
    | 'InvalidConfiguration'
    | 'InvalidRequest';

export class LoadBalancerError extends Error {
    public readonly code: LoadBalancerErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(
        code: LoadBalancerErrorCode,
        message: string,
        details?: Record<string, unknown>,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'LoadBalancerError';
        this.code = code;
        this.details = details;
    }

    toObject(): { code: LoadBalancerErrorCode; message: string; details?: Record<string, unknown> } {
        return { code: this.code, message: this.message, details: this.details };
    }
}

export class DiscoveryUnavailableError extends LoadBalancerError {
    constructor(public readonly clientName: string, cause?: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(
            'DiscoveryUnavailable',
            `Discovery backend unavailable for "${clientName}": ${reason}`,
            { clientName },
            { cause },
        );
        this.name = 'DiscoveryUnavailableError';
    }
}

/**
 * Where the candidate set ran dry. Lets callers tell "nothing registered"
 * apart from "everything filtered or unhealthy".
 */
export type NoServerReason = 'empty-registry' | 'filtered-out' | 'unreachable' | 'empty-candidates';

export class NoAvailableServerError extends LoadBalancerError {
    constructor(public readonly clientName: string, public readonly reason: NoServerReason) {
        super('NoAvailableServer', `No available server for "${clientName}" (${reason})`, {
            clientName,
            reason,
        });
        this.name = 'NoAvailableServerError';
    }
}

export class ProbeTimeoutError extends LoadBalancerError {
    constructor(public readonly server: string, public readonly timeoutMs: number) {
        super('ProbeTimeout', `Health probe to ${server} timed out after ${timeoutMs}ms`, {
            server,
            timeoutMs,
        });
        this.name = 'ProbeTimeoutError';
    }
}

export class InvalidConfigurationError extends LoadBalancerError {
    constructor(message: string, public readonly issues: string[] = []) {
        super('InvalidConfiguration', message, issues.length > 0 ? { issues } : undefined);
        this.name = 'InvalidConfigurationError';
    }
}

export class InvalidRequestError extends LoadBalancerError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('InvalidRequest', message, details);
        this.name = 'InvalidRequestError';
    }
}

export function isLoadBalancerError(error: unknown): error is LoadBalancerError {
    return error instanceof LoadBalancerError;
}
