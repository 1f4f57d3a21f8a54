import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import express from 'express';
import { createGateway } from '../../src/gateway';
import { createBackend } from '../../src/backends';
import { ClientFactory } from '../../src/load-balancer/client-factory';
import { StaticDiscoveryClient } from '../../src/discovery/static-discovery-client';
import { listen, type Listening } from '../helpers/fixtures';

describe('gateway', () => {
    let backend1: Listening;
    let backend2: Listening;
    let deadPort: number;

    let factory: ClientFactory;
    let app: express.Express;

    beforeAll(async () => {
        backend1 = await listen(createBackend('backend-1', { zone: 'zone-a' }));
        backend2 = await listen(createBackend('backend-2', { zone: 'zone-b' }));

        const closed = await listen(express());
        deadPort = closed.port;
        await closed.close();
    });

    afterAll(async () => {
        await Promise.all([backend1.close(), backend2.close()]);
    });

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const discovery = new StaticDiscoveryClient({
            'users-svc': [
                { instanceId: 'users-1', host: '127.0.0.1', port: backend1.port, zone: 'zone-a' },
                { instanceId: 'users-2', host: '127.0.0.1', port: backend2.port, zone: 'zone-b' },
            ],
            'dead-svc': [
                { instanceId: 'dead-1', host: '127.0.0.1', port: deadPort },
            ],
        });

        factory = new ClientFactory({
            discovery,
            clients: {
                users: {
                    source: { type: 'discovery', serviceId: 'users-svc' },
                    filter: { type: 'pass-through' },
                    rule: { type: 'round-robin' },
                },
                zoned: {
                    source: { type: 'discovery', serviceId: 'users-svc' },
                    rule: { type: 'round-robin' },
                },
                empty: {
                    source: { type: 'configuration', listOfServers: [] },
                },
                dead: {
                    source: { type: 'discovery', serviceId: 'dead-svc' },
                },
            },
        });
        app = createGateway(factory, { timeoutMs: 2000 });
    });

    afterEach(async () => {
        await factory.close();
        vi.restoreAllMocks();
    });

    it('proxies to the chosen upstream and says which one', async () => {
        const res = await request(app).get('/users/api/users');

        expect(res.status).toBe(200);
        expect(res.body.server).toBe('backend-1');
        expect(res.body.data).toHaveLength(3);
        expect(res.headers['x-upstream']).toBe(`127.0.0.1:${backend1.port}`);
        expect(res.headers['x-upstream-scheme']).toBe('http');
        expect(res.headers['x-response-time']).toMatch(/^\d+ms$/);
    });

    it('forwards path, query and method with the upstream host', async () => {
        const res = await request(app).post('/users/orders/42?expand=true');

        expect(res.status).toBe(200);
        expect(res.body).toEqual({
            server: 'backend-1',
            zone: 'zone-a',
            method: 'POST',
            path: '/orders/42',
            query: { expand: 'true' },
            host: `127.0.0.1:${backend1.port}`,
        });
    });

    it('rotates between upstreams', async () => {
        const first = await request(app).get('/users/api/users');
        const second = await request(app).get('/users/api/users');
        const third = await request(app).get('/users/api/users');

        expect([first.body.server, second.body.server, third.body.server])
            .toEqual(['backend-1', 'backend-2', 'backend-1']);
    });

    it('honours a preferred zone header', async () => {
        const res = await request(app).get('/zoned/api/users').set('x-preferred-zone', 'zone-b');

        expect(res.status).toBe(200);
        expect(res.body.server).toBe('backend-2');
    });

    it('answers 404 for an unknown client', async () => {
        const res = await request(app).get('/billing/api/invoices');

        expect(res.status).toBe(404);
        expect(res.body).toEqual({
            error: 'Not Found',
            message: 'Unknown client "billing"',
            available: ['users', 'zoned', 'empty', 'dead'],
        });
    });

    it('answers 503 when a client has no servers', async () => {
        const res = await request(app).get('/empty/api/x');

        expect(res.status).toBe(503);
        expect(res.body).toEqual({
            error: 'Service Unavailable',
            code: 'NoAvailableServer',
            message: 'No available server for "empty" (empty-registry)',
            details: { clientName: 'empty', reason: 'empty-registry' },
        });
    });

    it('answers 502 when the upstream refuses the connection', async () => {
        const res = await request(app).get('/dead/api/x');

        expect(res.status).toBe(502);
        expect(res.body).toEqual({
            error: 'Bad Gateway',
            message: `127.0.0.1:${deadPort} is unavailable`,
        });
    });

    it('reports pipeline and client state on the health endpoint', async () => {
        await request(app).get('/users/api/users');

        const res = await request(app).get('/gateway/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
        expect(res.body.pipeline).toEqual(['logger', 'route', 'proxy']);
        expect(res.body.configured).toEqual(['users', 'zoned', 'empty', 'dead']);
        expect(res.body.clients).toEqual([{
            name: 'users',
            source: 'discovery',
            filter: 'pass-through',
            probe: 'no-op',
            rule: 'round-robin',
            servers: 2,
            version: 1,
            stale: false,
            running: true,
        }]);
    });

    it('refreshes a client on demand', async () => {
        const res = await request(app).post('/gateway/clients/users/refresh');

        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ name: 'users', servers: 2, version: 2 });
    });

    it('answers 404 when refreshing an unknown client', async () => {
        const res = await request(app).post('/gateway/clients/billing/refresh');

        expect(res.status).toBe(404);
        expect(res.body.error).toBe('Client not found');
    });
});
