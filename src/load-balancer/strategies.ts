import type { ClientConfig } from '../config/client-config';
import { ConfigurationServerList } from '../discovery/configuration-server-list';
import { DiscoveryServerList } from '../discovery/discovery-server-list';
import type { DiscoveryClient, ServerListSource } from '../discovery/types';
import { InvalidConfigurationError } from '../errors';
import { PassThroughFilter } from '../filters/pass-through';
import type { SelectionFilter } from '../filters/types';
import { ZonePreferenceFilter } from '../filters/zone-preference';
import { CircuitBreakerProbe } from '../health/circuit-breaker-probe';
import { HttpPingProbe } from '../health/http-ping-probe';
import { NoOpProbe } from '../health/no-op-probe';
import type { HealthProbe } from '../health/types';
import { createRandom } from '../random';
import { RandomRule } from '../rules/random';
import { RoundRobinRule } from '../rules/round-robin';
import type { SelectionRule } from '../rules/types';
import { ZoneAvoidanceRule } from '../rules/zone-avoidance';

/** The four substitution points of a load balancer. */
export interface LoadBalancerStrategies {
    source: ServerListSource;
    probe: HealthProbe;
    filter: SelectionFilter;
    rule: SelectionRule;
}

export interface StrategyDependencies {
    discovery?: DiscoveryClient;
    now?: () => number;
}

// ── Defaults from configuration ─────────────────────────────────
//
//   source  → configuration list, or discovery when a client is given
//   filter  → zone preference on the client's own zone
//   probe   → no-op (the discovery backend already filters dead nodes)
//   rule    → zone avoidance

export function buildSource(config: ClientConfig, deps: StrategyDependencies): ServerListSource {
    const source = config.source;
    switch (source.type) {
    case 'configuration':
        return new ConfigurationServerList(source.listOfServers);
    case 'discovery':
        if (!deps.discovery) {
            throw new InvalidConfigurationError(
                `Client "${config.name}" uses a discovery source but no discovery client was provided`
            );
        }
        return new DiscoveryServerList(deps.discovery, {
            serviceId: source.serviceId ?? config.name,
            useSecurePort: source.useSecurePort,
        });
    }
}

export function buildFilter(config: ClientConfig): SelectionFilter {
    const filter = config.filter;
    switch (filter.type) {
    case 'zone-preference':
        return new ZonePreferenceFilter(filter.zone ?? config.zone);
    case 'pass-through':
        return new PassThroughFilter();
    }
}

export function buildProbe(config: ClientConfig, deps: StrategyDependencies): HealthProbe {
    const probe = config.probe;
    switch (probe.type) {
    case 'no-op':
        return new NoOpProbe();
    case 'http':
        return new HttpPingProbe({
            path: probe.path,
            timeoutMs: probe.timeoutMs,
            cacheTtlMs: probe.cacheTtlMs,
            intervalMs: probe.intervalMs,
            secure: probe.secure,
            now: deps.now,
        });
    case 'circuit-breaker':
        return new CircuitBreakerProbe({
            failureThreshold: probe.failureThreshold,
            resetTimeoutMs: probe.resetTimeoutMs,
            monitorWindowMs: probe.monitorWindowMs,
            halfOpenMax: probe.halfOpenMax,
            now: deps.now,
        });
    }
}

export function buildRule(config: ClientConfig): SelectionRule {
    const rule = config.rule;
    const random = createRandom(config.randomSeed);
    switch (rule.type) {
    case 'zone-avoidance':
        return new ZoneAvoidanceRule(
            { availabilityThreshold: rule.availabilityThreshold, zoneWeights: rule.zoneWeights },
            random,
        );
    case 'round-robin':
        return new RoundRobinRule();
    case 'random':
        return new RandomRule(random);
    }
}

/**
 * Build every strategy, letting any of them be replaced independently.
 * Defaults for overridden strategies are never constructed.
 */
export function buildStrategies(
    config: ClientConfig,
    overrides: Partial<LoadBalancerStrategies> = {},
    deps: StrategyDependencies = {},
): LoadBalancerStrategies {
    return {
        source: overrides.source ?? buildSource(config, deps),
        probe: overrides.probe ?? buildProbe(config, deps),
        filter: overrides.filter ?? buildFilter(config),
        rule: overrides.rule ?? buildRule(config),
    };
}
