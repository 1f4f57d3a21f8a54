import { NoAvailableServerError } from '../errors';
import type { Server } from '../servers/types';
import type { RuleContext, SelectionRule } from './types';

// =================================================================
// ROUND ROBIN RULE
// =================================================================
//
// Rotate through the candidates in order.
//
//   Request 1 → Server A
//   Request 2 → Server B
//   Request 3 → Server C
//   Request 4 → Server A (wraps around)
//
// The candidate list can change between calls (refresh, health),
// so the index is taken modulo the current length.
// =================================================================

export class RoundRobinRule implements SelectionRule {
    name = 'round-robin';
    private index = 0;

    choose(candidates: readonly Server[], context: RuleContext): Server {
        if (candidates.length === 0) throw new NoAvailableServerError(context.clientName, 'empty-candidates');

        const server = candidates[this.index % candidates.length];
        this.index = (this.index + 1) % Number.MAX_SAFE_INTEGER;

        return server;
    }
}
