import type { GatewayMiddleware, GatewayContext, NextFunction } from './types';
import { serverKey } from '../servers/types';

// Logs once the response is sent, so timing and status are known.
export class LoggerMiddleware implements GatewayMiddleware {
    name = 'logger';

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res, startTime } = ctx;

        res.on('finish', () => {
            const elapsed = Date.now() - startTime;
            const upstream = ctx.routed ? serverKey(ctx.routed.server) : 'none';
            console.log(`${req.method} ${req.originalUrl} → ${upstream} [${res.statusCode}] ${elapsed}ms`);
        });

        await next();
    }
}
