import type { Server } from '../servers/types';
import type { SelectionFilter } from './types';

export class PassThroughFilter implements SelectionFilter {
    name = 'pass-through';

    apply(candidates: readonly Server[]): readonly Server[] {
        return [...candidates];
    }
}
