import type { Request, Response } from 'express';
import type { GatewayContext, GatewayMiddleware } from './types';

// =================================================================
// MIDDLEWARE PIPELINE
// =================================================================
//
// Chains middleware together in order.
// Each middleware calls next() to continue, or doesn't to stop.
//
//   pipeline.use(logger);  // 1st: always logs, even rejected requests
//   pipeline.use(route);   // 2nd: might stop here (404 / 503)
//   pipeline.use(proxy);   // 3rd: final destination
// =================================================================

function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
}

/** Split "/orders/api/x?id=1" into "orders" and "/api/x?id=1". */
export function splitClientPath(originalUrl: string): { clientName: string; upstreamPath: string } {
    const queryAt = originalUrl.indexOf('?');
    const path = queryAt >= 0 ? originalUrl.slice(0, queryAt) : originalUrl;
    const query = queryAt >= 0 ? originalUrl.slice(queryAt) : '';

    const trimmed = path.replace(/^\/+/, '');
    const slash = trimmed.indexOf('/');
    const clientName = decodeSegment(slash >= 0 ? trimmed.slice(0, slash) : trimmed);
    const rest = slash >= 0 ? trimmed.slice(slash) : '/';

    return { clientName, upstreamPath: `${rest}${query}` };
}

export class MiddlewarePipeline {
    private middleware: GatewayMiddleware[] = [];

    use(mw: GatewayMiddleware): MiddlewarePipeline {
        this.middleware.push(mw);
        return this; // Chainable: pipeline.use(a).use(b).use(c)
    }

    /**
     * Execute the pipeline for a request.
     * Each middleware gets a next() that calls the NEXT middleware.
     */
    async execute(req: Request, res: Response): Promise<void> {
        const { clientName, upstreamPath } = splitClientPath(req.originalUrl);
        const ctx: GatewayContext = {
            req,
            res,
            startTime: Date.now(),
            clientName,
            upstreamPath,
            meta: {},
        };

        let index = 0;

        const next = async (): Promise<void> => {
            if (index >= this.middleware.length) return;

            const mw = this.middleware[index];
            index++;

            try {
                await mw.handle(ctx, next);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                console.error(`[gateway] Middleware [${mw.name}] error: ${message}`);

                if (!res.headersSent) {
                    res.status(500).json({
                        error: 'Internal Gateway Error',
                        middleware: mw.name,
                        message,
                    });
                }
            }
        };

        await next();
    }

    getMiddlewareNames(): string[] {
        return this.middleware.map(m => m.name);
    }
}
