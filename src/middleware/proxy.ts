import http from 'http';
import https from 'https';
import type { GatewayMiddleware, GatewayContext, NextFunction } from './types';
import { serverKey } from '../servers/types';

// =================================================================
// PROXY MIDDLEWARE (final step in the pipeline)
// =================================================================
// Forwards the request to the URI the route middleware produced,
// over https when the scheme was upgraded. Reports the outcome to
// the load balancer so circuit-breaking probes can react:
//
//   5xx / timeout / socket error → failure
//   anything else                → success
// =================================================================

export interface ProxyOptions {
    timeoutMs: number;
}

export class ProxyMiddleware implements GatewayMiddleware {
    name = 'proxy';

    constructor(private readonly options: ProxyOptions) {}

    async handle(ctx: GatewayContext, _next: NextFunction): Promise<void> {
        const { req, res, routed, loadBalancer: lb } = ctx;

        if (!routed || !lb) {
            res.status(500).json({ error: 'No upstream selected' });
            return;
        }

        const target = new URL(routed.uri);
        const transport = target.protocol === 'https:' ? https : http;
        const upstream = serverKey(routed.server);

        return new Promise<void>((resolve) => {
            const options: http.RequestOptions = {
                hostname: routed.server.host,
                port: routed.server.port,
                path: `${target.pathname}${target.search}`,
                method: req.method,
                headers: {
                    ...req.headers,
                    host: upstream,
                },
                timeout: this.options.timeoutMs,
            };

            const upstreamReq = transport.request(options, (upstreamRes) => {
                const status = upstreamRes.statusCode ?? 502;
                lb.recordOutcome(routed.server, status < 500);

                res.setHeader('x-upstream', upstream);
                res.setHeader('x-upstream-scheme', target.protocol.replace(/:$/, ''));
                res.setHeader('x-response-time', `${Date.now() - ctx.startTime}ms`);

                res.writeHead(status, upstreamRes.headers);
                upstreamRes.pipe(res);
                upstreamRes.on('close', resolve);
            });

            upstreamReq.on('timeout', () => {
                upstreamReq.destroy();
                lb.recordOutcome(routed.server, false);

                if (!res.headersSent) {
                    res.writeHead(504, { 'Content-Type': 'application/json' });
                    res.end(JSON.stringify({
                        error: 'Gateway Timeout',
                        message: `${upstream} did not respond in time`,
                    }));
                }
                resolve();
            });

            upstreamReq.on('error', (err) => {
                // destroy() after a timeout lands here too; the timeout already answered
                if (res.headersSent) {
                    resolve();
                    return;
                }
                lb.recordOutcome(routed.server, false);
                console.error(`[gateway] ${upstream} error: ${err.message}`);

                res.writeHead(502, { 'Content-Type': 'application/json' });
                res.end(JSON.stringify({
                    error: 'Bad Gateway',
                    message: `${upstream} is unavailable`,
                }));
                resolve();
            });

            req.pipe(upstreamReq);
        });
    }
}
