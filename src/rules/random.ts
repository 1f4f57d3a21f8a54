import { NoAvailableServerError } from '../errors';
import { pickOne, type RandomSource } from '../random';
import type { Server } from '../servers/types';
import type { RuleContext, SelectionRule } from './types';

/** Uniform random pick. */
export class RandomRule implements SelectionRule {
    name = 'random';

    constructor(private readonly random: RandomSource) {}

    choose(candidates: readonly Server[], context: RuleContext): Server {
        if (candidates.length === 0) throw new NoAvailableServerError(context.clientName, 'empty-candidates');
        return pickOne(candidates, this.random);
    }
}
