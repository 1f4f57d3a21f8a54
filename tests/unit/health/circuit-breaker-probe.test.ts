import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CircuitBreakerProbe } from '../../../src/health/circuit-breaker-probe';
import { plainServer } from '../../../src/servers/types';

describe('CircuitBreakerProbe', () => {
    let clock: number;
    let probe: CircuitBreakerProbe;

    const a = plainServer('10.0.0.1', 8080);
    const b = plainServer('10.0.0.2', 8080);

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        clock = 0;
        probe = new CircuitBreakerProbe({
            failureThreshold: 2,
            resetTimeoutMs: 1_000,
            monitorWindowMs: 500,
            halfOpenMax: 1,
            now: () => clock,
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('treats servers without traffic as reachable', () => {
        expect(probe.isReachable(a)).toBe(true);
        expect(probe.getState(a)).toBe('CLOSED');
    });

    it('opens after repeated failures and isolates the server', () => {
        probe.onRequestComplete(a, false);
        probe.onRequestComplete(a, false);

        expect(probe.getState(a)).toBe('OPEN');
        expect(probe.isReachable(a)).toBe(false);
        expect(probe.isReachable(b)).toBe(true);
    });

    it('only counts failures inside the monitor window', () => {
        probe.onRequestComplete(a, false);
        clock = 600;
        probe.onRequestComplete(a, false);

        expect(probe.getState(a)).toBe('CLOSED');
    });

    it('lets one trial through after the reset timeout', () => {
        probe.onRequestComplete(a, false);
        probe.onRequestComplete(a, false);

        clock = 1_000;
        expect(probe.getState(a)).toBe('HALF_OPEN');
        expect(probe.isReachable(a)).toBe(true);

        probe.onServerChosen(a);
        expect(probe.isReachable(a)).toBe(false);

        probe.onRequestComplete(a, true);
        expect(probe.getState(a)).toBe('CLOSED');
        expect(probe.isReachable(a)).toBe(true);
    });

    it('reopens when the trial fails', () => {
        probe.onRequestComplete(a, false);
        probe.onRequestComplete(a, false);

        clock = 1_000;
        probe.onServerChosen(a);
        probe.onRequestComplete(a, false);

        expect(probe.getState(a)).toBe('OPEN');

        clock = 1_999;
        expect(probe.isReachable(a)).toBe(false);
        clock = 2_000;
        expect(probe.isReachable(a)).toBe(true);
    });

    it('drops breakers of servers that left the list', async () => {
        probe.onRequestComplete(a, false);
        probe.onRequestComplete(a, false);
        probe.onRequestComplete(b, true);

        await probe.probe([b]);

        expect(probe.getStats().map(s => s.name)).toEqual(['10.0.0.2:8080']);
        expect(probe.getState(a)).toBe('CLOSED');
        expect(probe.isReachable(a)).toBe(true);
    });

    it('reports per-server stats', () => {
        probe.onRequestComplete(a, true);
        probe.onRequestComplete(b, false);

        expect(probe.getStats().map(s => [s.name, s.totalSuccesses, s.totalFailures])).toEqual([
            ['10.0.0.1:8080', 1, 0],
            ['10.0.0.2:8080', 0, 1],
        ]);
    });
});
