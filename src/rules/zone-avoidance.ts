import { NoAvailableServerError } from '../errors';
import { pickOne, type RandomSource } from '../random';
import { serverZone, type Server } from '../servers/types';
import type { RuleContext, SelectionRule } from './types';

// =================================================================
// ZONE AVOIDANCE RULE
// =================================================================
//
// Steer traffic away from zones that are doing badly.
//
// 1. Partition candidates by zone.
// 2. Score each zone:
//      availability = reachable servers / eligible servers
//      score        = availability × zone weight (default 1)
// 3. Drop zones scoring below threshold × best score.
// 4. Pick uniformly among the servers of the zones left.
//
//   threshold 0.5
//   zone 1a: 2/2 reachable → 1.0   keep
//   zone 1b: 1/4 reachable → 0.25  drop (< 0.5 × 1.0)
//
// One zone, all zones scoring alike, or every score at 0 → plain
// uniform pick over all candidates. Zone names and weight keys are
// compared case-insensitively.
//
// Scores are rebuilt from the live candidates on every call; the
// only state kept between calls is the random source.
// =================================================================

export interface ZoneAvoidanceOptions {
    availabilityThreshold: number;
    zoneWeights?: Readonly<Record<string, number>>;
}

export interface ZoneScore {
    zone: string;
    eligible: number;
    reachable: number;
    score: number;
}

function zoneOf(server: Server): string {
    return serverZone(server).toLowerCase();
}

export class ZoneAvoidanceRule implements SelectionRule {
    name = 'zone-avoidance';
    private readonly weights = new Map<string, number>();

    constructor(
        private readonly options: ZoneAvoidanceOptions,
        private readonly random: RandomSource,
    ) {
        for (const [zone, weight] of Object.entries(options.zoneWeights ?? {})) {
            this.weights.set(zone.toLowerCase(), weight);
        }
    }

    choose(candidates: readonly Server[], context: RuleContext): Server {
        if (candidates.length === 0) throw new NoAvailableServerError(context.clientName, 'empty-candidates');

        const byZone = this.partition(candidates);
        if (byZone.size === 1) return pickOne(candidates, this.random);

        const scores = this.scoreZones(byZone, context.eligible);
        const best = Math.max(...scores.map(s => s.score));
        const allEqual = scores.every(s => s.score === best);

        if (best <= 0 || allEqual) return pickOne(candidates, this.random);

        const cutoff = this.options.availabilityThreshold * best;
        const kept = new Set(scores.filter(s => s.score >= cutoff).map(s => s.zone));
        const pool = candidates.filter(s => kept.has(zoneOf(s)));

        return pickOne(pool.length > 0 ? pool : candidates, this.random);
    }

    /** Per-zone scores for the given reachable candidates. */
    scoreZones(byZone: ReadonlyMap<string, readonly Server[]>, eligible: readonly Server[]): ZoneScore[] {
        const eligibleCounts = new Map<string, number>();
        for (const server of eligible) {
            const zone = zoneOf(server);
            eligibleCounts.set(zone, (eligibleCounts.get(zone) ?? 0) + 1);
        }

        return [...byZone.entries()].map(([zone, servers]) => {
            const reachable = servers.length;
            const total = Math.max(eligibleCounts.get(zone) ?? 0, reachable);
            const weight = this.weights.get(zone) ?? 1;

            return { zone, eligible: total, reachable, score: (reachable / total) * weight };
        });
    }

    partition(servers: readonly Server[]): Map<string, Server[]> {
        const byZone = new Map<string, Server[]>();
        for (const server of servers) {
            const zone = zoneOf(server);
            const members = byZone.get(zone);
            if (members) members.push(server);
            else byZone.set(zone, [server]);
        }
        return byZone;
    }
}
