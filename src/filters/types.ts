import type { Server } from '../servers/types';

export interface FilterContext {
    /** Overrides the filter's configured zone for this selection */
    preferredZone?: string;
}

export interface SelectionFilter {
    /** Filter name, for logs and describe() */
    name: string;

    /**
     * Narrow the candidate list. Returns a new array holding only members of
     * `candidates`, in their original order.
     */
    apply(candidates: readonly Server[], context: FilterContext): readonly Server[];
}
