import { serverZone, type Server } from '../servers/types';
import type { FilterContext, SelectionFilter } from './types';

// =================================================================
// ZONE PREFERENCE FILTER
// =================================================================
//
// Keep only servers in the caller's own zone, when there are any.
//
//   zone = us-east-1a
//   [a1 (1a), b1 (1b), a2 (1a)]  →  [a1, a2]
//   [b1 (1b), c1 (1c)]           →  [b1, c1]   ← nobody local: pass through
//
// Falling back to the full list means an over-narrow preference
// can never starve selection of every candidate.
// =================================================================

export class ZonePreferenceFilter implements SelectionFilter {
    name = 'zone-preference';

    constructor(private readonly zone?: string) {}

    apply(candidates: readonly Server[], context: FilterContext = {}): readonly Server[] {
        const zone = context.preferredZone ?? this.zone;
        if (!zone) return [...candidates];

        const wanted = zone.toLowerCase();
        const local = candidates.filter(s => serverZone(s).toLowerCase() === wanted);

        return local.length > 0 ? local : [...candidates];
    }
}
