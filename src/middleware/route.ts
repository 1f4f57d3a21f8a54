import type { GatewayMiddleware, GatewayContext, NextFunction } from './types';
import type { ClientFactory } from '../load-balancer/client-factory';
import { isLoadBalancerError } from '../errors';
import { RequestRouter } from '../router/request-router';

// =================================================================
// ROUTE MIDDLEWARE
// =================================================================
// Resolves the logical client from the first path segment, asks its
// load balancer for a server and rewrites the target URI.
//
//   unknown client       → 404
//   NoAvailableServer    → 503
//   InvalidRequest       → 400
//
// Sets ctx.loadBalancer and ctx.routed for the proxy middleware.
// =================================================================

const STATUS_BY_CODE: Record<string, number> = {
    NoAvailableServer: 503,
    InvalidRequest: 400,
    InvalidConfiguration: 500,
};

export class RouteMiddleware implements GatewayMiddleware {
    name = 'route';
    private readonly router = new RequestRouter();

    constructor(private readonly factory: ClientFactory) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { res, req, clientName } = ctx;

        if (!clientName || !this.factory.has(clientName)) {
            res.status(404).json({
                error: 'Not Found',
                message: `Unknown client "${clientName}"`,
                available: this.factory.names(),
            });
            return;
        }

        try {
            const lb = await this.factory.getLoadBalancer(clientName);
            const preferredZone = req.get('x-preferred-zone');

            ctx.loadBalancer = lb;
            ctx.routed = this.router.route(
                { uri: `http://${clientName}${ctx.upstreamPath}`, method: req.method },
                lb,
                preferredZone ? { preferredZone } : undefined,
            );
        } catch (err) {
            if (!isLoadBalancerError(err)) throw err;

            const status = STATUS_BY_CODE[err.code] ?? 500;
            res.status(status).json({
                error: status === 503 ? 'Service Unavailable' : err.name,
                ...err.toObject(),
            });
            return;
        }

        await next();
    }
}
