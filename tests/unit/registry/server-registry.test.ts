import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ServerRegistry, type StaleEvent } from '../../../src/registry/server-registry';
import { DiscoveryUnavailableError } from '../../../src/errors';
import { plainServer, type Server } from '../../../src/servers/types';
import { ScriptedSource, deferred, fixedSource } from '../../helpers/fixtures';

const servers = (count: number): Server[] =>
    Array.from({ length: count }, (_, i) => plainServer(`10.0.0.${i + 1}`, 8080));

describe('ServerRegistry', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('starts with an empty, fresh snapshot', () => {
        const registry = new ServerRegistry('orders', fixedSource([]), { intervalMs: 1000, timeoutMs: 500 });

        expect(registry.getSnapshot()).toEqual({ servers: [], version: 0, refreshedAt: 0, stale: false });
    });

    it('publishes a frozen snapshot on refresh', async () => {
        const registry = new ServerRegistry('orders', fixedSource(servers(2)), {
            intervalMs: 1000,
            timeoutMs: 500,
            now: () => 1234,
        });

        const result = await registry.refresh();
        const snapshot = registry.getSnapshot();

        expect(result).toBe(snapshot.servers);
        expect(snapshot).toEqual({ servers: servers(2), version: 1, refreshedAt: 1234, stale: false });
        expect(Object.isFrozen(snapshot)).toBe(true);
        expect(Object.isFrozen(snapshot.servers)).toBe(true);
    });

    it('publishes an empty list when the source returns one', async () => {
        const source = new ScriptedSource([async () => servers(2), async () => []]);
        const registry = new ServerRegistry('orders', source, { intervalMs: 1000, timeoutMs: 500 });

        await registry.refresh();
        await registry.refresh();

        expect(registry.getSnapshot().servers).toEqual([]);
        expect(registry.getSnapshot().version).toBe(2);
    });

    it('keeps the last snapshot and flags it stale when the source fails', async () => {
        const source = new ScriptedSource([
            async () => servers(3),
            async () => { throw new Error('connection refused'); },
        ]);
        const registry = new ServerRegistry('orders', source, { intervalMs: 1000, timeoutMs: 500 });
        const events: StaleEvent[] = [];
        registry.onStale(event => events.push(event));

        await registry.refresh();
        const result = await registry.refresh();

        expect(result).toEqual(servers(3));
        expect(registry.getSnapshot()).toMatchObject({ version: 1, stale: true });
        expect(events).toHaveLength(1);
        expect(events[0].error).toBeInstanceOf(DiscoveryUnavailableError);
        expect(events[0].error.message).toBe('Discovery backend unavailable for "orders": connection refused');
    });

    it('clears the stale flag once the source recovers', async () => {
        const source = new ScriptedSource([
            async () => servers(1),
            async () => { throw new Error('down'); },
            async () => servers(2),
        ]);
        const registry = new ServerRegistry('orders', source, { intervalMs: 1000, timeoutMs: 500 });

        await registry.refresh();
        await registry.refresh();
        await registry.refresh();

        expect(registry.getSnapshot()).toMatchObject({ version: 2, stale: false });
        expect(registry.getServers()).toEqual(servers(2));
    });

    it('gives up on a source slower than the timeout and aborts it', async () => {
        const source = new ScriptedSource([
            async () => servers(1),
            () => new Promise<Server[]>(() => undefined),
        ]);
        const registry = new ServerRegistry('orders', source, { intervalMs: 1000, timeoutMs: 20 });
        const events: StaleEvent[] = [];
        registry.onStale(event => events.push(event));

        await registry.refresh();
        const result = await registry.refresh();

        expect(result).toEqual(servers(1));
        expect(registry.getSnapshot().stale).toBe(true);
        expect(source.signals[1]?.aborted).toBe(true);
        expect(events[0].error.message).toBe(
            'Discovery backend unavailable for "orders": refresh timed out after 20ms',
        );
    });

    it('shares one pull between concurrent refreshes', async () => {
        const pending = deferred<Server[]>();
        const source = new ScriptedSource([() => pending.promise]);
        const registry = new ServerRegistry('orders', source, { intervalMs: 1000, timeoutMs: 500 });

        const first = registry.refresh();
        const second = registry.refresh();
        pending.resolve(servers(2));

        expect(await first).toBe(await second);
        expect(source.calls).toBe(1);
        expect(registry.getSnapshot().version).toBe(1);
    });

    it('swaps the whole list at once', async () => {
        const next = deferred<Server[]>();
        const source = new ScriptedSource([async () => servers(5), () => next.promise]);
        const registry = new ServerRegistry('orders', source, { intervalMs: 1000, timeoutMs: 500 });

        await registry.refresh();
        const before = registry.getSnapshot();

        const refreshing = registry.refresh();
        expect(registry.getSnapshot().servers).toHaveLength(5);

        next.resolve(servers(7));
        await refreshing;

        expect(registry.getSnapshot().servers).toHaveLength(7);
        // a reader holding the old snapshot still sees all 5
        expect(before.servers).toHaveLength(5);
        expect(before.version).toBe(1);
    });

    it('notifies refresh listeners with the new snapshot', async () => {
        const registry = new ServerRegistry('orders', fixedSource(servers(2)), { intervalMs: 1000, timeoutMs: 500 });
        const seen: number[] = [];
        registry.onRefresh(snapshot => seen.push(snapshot.version));

        await registry.refresh();
        await registry.refresh();

        expect(seen).toEqual([1, 2]);
    });

    it('refreshes on its interval until stopped', async () => {
        vi.useFakeTimers();
        const source = fixedSource(servers(1));
        const registry = new ServerRegistry('orders', source, { intervalMs: 1000, timeoutMs: 500 });

        registry.start();
        registry.start();
        expect(registry.isRunning()).toBe(true);

        await vi.advanceTimersByTimeAsync(1000);
        expect(source.calls).toBe(1);

        await vi.advanceTimersByTimeAsync(1000);
        expect(source.calls).toBe(2);

        registry.stop();
        expect(registry.isRunning()).toBe(false);

        await vi.advanceTimersByTimeAsync(5000);
        expect(source.calls).toBe(2);
    });
});
