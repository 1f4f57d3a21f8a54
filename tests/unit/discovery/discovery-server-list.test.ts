import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DiscoveryServerList } from '../../../src/discovery/discovery-server-list';
import { StaticDiscoveryClient } from '../../../src/discovery/static-discovery-client';

const records = [
    { instanceId: 'orders-1', host: '10.0.0.1', port: 8080, zone: 'zone-a' },
    {
        instanceId: 'orders-2',
        host: '10.0.0.2',
        port: 8080,
        securePort: 8443,
        securePortEnabled: true,
        metadata: { zone: 'zone-b' },
    },
    { instanceId: 'orders-3', host: '10.0.0.3', port: 8080, status: 'DOWN' as const },
];

describe('DiscoveryServerList', () => {
    let client: StaticDiscoveryClient;

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        client = new StaticDiscoveryClient({ 'orders-svc': records });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('keeps only instances reporting UP', async () => {
        const servers = await new DiscoveryServerList(client, { serviceId: 'orders-svc' }).getServers();

        expect(servers.map(s => s.host)).toEqual(['10.0.0.1', '10.0.0.2']);
    });

    it('carries instance metadata onto the server', async () => {
        const [first, second] = await new DiscoveryServerList(client, { serviceId: 'orders-svc' }).getServers();

        expect(first).toEqual({
            kind: 'discovery',
            host: '10.0.0.1',
            port: 8080,
            zone: 'zone-a',
            instanceId: 'orders-1',
            securePortEnabled: false,
            securePort: undefined,
            metadata: {},
        });
        // zone falls back to the metadata entry
        expect(second.zone).toBe('zone-b');
        expect(second.kind === 'discovery' && second.securePortEnabled).toBe(true);
    });

    it('addresses secure ports when asked to', async () => {
        const servers = await new DiscoveryServerList(client, {
            serviceId: 'orders-svc',
            useSecurePort: true,
        }).getServers();

        expect(servers.map(s => s.port)).toEqual([8080, 8443]);
    });

    it('looks service ids up case-insensitively', async () => {
        const servers = await new DiscoveryServerList(client, { serviceId: 'ORDERS-SVC' }).getServers();
        expect(servers).toHaveLength(2);
    });

    it('skips malformed records', async () => {
        client.setInstances('orders-svc', [
            { instanceId: 'orders-1', host: '10.0.0.1', port: 8080 },
            { instanceId: 'broken', host: '10.0.0.9', port: 'eighty' },
            'not-a-record',
        ]);

        const servers = await new DiscoveryServerList(client, { serviceId: 'orders-svc' }).getServers();

        expect(servers.map(s => s.host)).toEqual(['10.0.0.1']);
        expect(console.warn).toHaveBeenCalledTimes(2);
    });

    it('propagates backend failures', async () => {
        client.fail(new Error('connection refused'));

        await expect(
            new DiscoveryServerList(client, { serviceId: 'orders-svc' }).getServers(),
        ).rejects.toThrow('connection refused');
    });
});
