import { createBackend } from './backends';
import { StaticDiscoveryClient } from './discovery/static-discovery-client';
import { createGateway } from './gateway';
import { ClientFactory } from './load-balancer/client-factory';

// =================================================================
// Start all services: 3 backends in 2 zones + gateway
// =================================================================

const GATEWAY_PORT = 4000;

const BACKENDS = [
    { name: 'Backend-A', port: 3001, zone: 'zone-a' },
    { name: 'Backend-B', port: 3002, zone: 'zone-a' },
    { name: 'Backend-C', port: 3003, zone: 'zone-b' },
];

console.log('\nStarting backend servers...\n');
for (const backend of BACKENDS) {
    createBackend(backend.name, { zone: backend.zone, maxDelayMs: 200 }).listen(backend.port, () => {
        console.log(`   ${backend.name} (${backend.zone}) running on http://localhost:${backend.port}`);
    });
}

const discovery = new StaticDiscoveryClient({
    users: BACKENDS.map((b) => ({
        instanceId: b.name.toLowerCase(),
        host: 'localhost',
        port: b.port,
        zone: b.zone,
    })),
});

const factory = new ClientFactory({
    discovery,
    clients: {
        users: {
            zone: 'zone-a',
            refreshIntervalMs: 10_000,
            source: { type: 'discovery' },
            rule: { type: 'zone-avoidance', availabilityThreshold: 0.5 },
            probe: { type: 'http', path: '/api/health', intervalMs: 5_000, cacheTtlMs: 4_000 },
        },
        static: {
            source: { type: 'configuration', listOfServers: BACKENDS.map((b) => `localhost:${b.port}`) },
            filter: { type: 'pass-through' },
            rule: { type: 'round-robin' },
            probe: { type: 'circuit-breaker', failureThreshold: 3, resetTimeoutMs: 15_000 },
        },
    },
});

const server = createGateway(factory).listen(GATEWAY_PORT, () => {
    console.log('');
    console.log('='.repeat(65));
    console.log('Client-side load balancing gateway');
    console.log('='.repeat(65));
    console.log('');
    console.log(`  Gateway: http://localhost:${GATEWAY_PORT}`);
    console.log(`  Clients: ${factory.names().join(', ')}`);
    console.log('');
    console.log('  GET  /gateway/health                → registry state per client');
    console.log('  POST /gateway/clients/:name/refresh → force a refresh');
    console.log('  ANY  /users/api/users               → zone-aware, health-probed');
    console.log('  ANY  /static/api/users              → round robin, circuit breakers');
    console.log('');
});

process.on('SIGINT', () => {
    server.close();
    void factory.close().finally(() => process.exit(0));
});
