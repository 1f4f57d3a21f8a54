import express from 'express';
import type { ClientFactory } from './load-balancer/client-factory';
import { isLoadBalancerError } from './errors';
import { MiddlewarePipeline } from './middleware/pipeline';
import { LoggerMiddleware } from './middleware/logger';
import { RouteMiddleware } from './middleware/route';
import { ProxyMiddleware } from './middleware/proxy';

// =================================================================
// GATEWAY: client-side load balancing behind one HTTP front door
// =================================================================
//
//   GET  /gateway/health               → every client's registry state
//   POST /gateway/clients/:name/refresh → force a registry refresh
//   ALL  /<client>/<path>              → route + proxy
//
// Requests flow through logger → route → proxy.
// =================================================================

export interface GatewayOptions {
    /** Upstream response timeout */
    timeoutMs?: number;
}

export function createGateway(factory: ClientFactory, options: GatewayOptions = {}): express.Express {
    const app = express();

    const pipeline = new MiddlewarePipeline()
        .use(new LoggerMiddleware())
        .use(new RouteMiddleware(factory))
        .use(new ProxyMiddleware({ timeoutMs: options.timeoutMs ?? 5000 }));

    // ── Management Endpoints ────────────────────────────────────

    app.get('/gateway/health', (_req, res) => {
        res.json({
            status: 'ok',
            pipeline: pipeline.getMiddlewareNames(),
            configured: factory.names(),
            clients: factory.describe(),
        });
    });

    app.post('/gateway/clients/:name/refresh', async (req, res) => {
        const name = req.params.name;
        if (!factory.has(name)) {
            res.status(404).json({ error: 'Client not found', available: factory.names() });
            return;
        }

        try {
            const lb = await factory.getLoadBalancer(name);
            await lb.refresh();
            console.log(`[gateway] Registry refreshed: ${name}`);
            res.json(lb.describe());
        } catch (err) {
            if (!isLoadBalancerError(err)) throw err;
            res.status(500).json(err.toObject());
        }
    });

    // ── Load Balanced Proxy ─────────────────────────────────────

    app.all('/{*path}', async (req, res) => {
        await pipeline.execute(req, res);
    });

    return app;
}
