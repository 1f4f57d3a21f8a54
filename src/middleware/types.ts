// =================================================================
// MIDDLEWARE TYPES
// =================================================================
//
// Every middleware receives a GatewayContext and a next() function.
//
// GatewayContext carries data between middleware:
//   - The Express req/res
//   - Logical client name (first path segment)
//   - Load balancer + routed request (set by the route middleware)
//   - Metadata, timing
//
// next() passes control to the next middleware in the chain.
// If a middleware doesn't call next(), the chain stops.
// This is how an unroutable request is rejected; it never reaches proxy.
// =================================================================

import type { Request, Response } from 'express';
import type { ClientLoadBalancer } from '../load-balancer/load-balancer';
import type { RoutedRequest } from '../router/request-router';

export interface GatewayContext {
    req: Request;
    res: Response;
    startTime: number;

    clientName: string;
    /** Path + query after the client segment, always starting with "/" */
    upstreamPath: string;

    // Set by middleware as request flows through
    loadBalancer?: ClientLoadBalancer;
    routed?: RoutedRequest;

    // Metadata any middleware can attach
    meta: Record<string, unknown>;
}

export type NextFunction = () => Promise<void>;

export interface GatewayMiddleware {
    name: string;
    handle(ctx: GatewayContext, next: NextFunction): Promise<void>;
}
