import type { Server } from '../servers/types';

export interface RuleContext {
    clientName: string;

    /**
     * Candidates after filtering but BEFORE health pruning. Rules that score
     * zones compare it with the reachable candidates they are handed.
     */
    eligible: readonly Server[];
}

export interface SelectionRule {
    /** Algorithm name */
    name: string;

    /**
     * Pick one member of `candidates`.
     * Throws NoAvailableServerError when `candidates` is empty.
     */
    choose(candidates: readonly Server[], context: RuleContext): Server;
}
