export * from './errors';
export * from './servers/types';
export { createRandom, pickOne, type RandomSource } from './random';

export * from './config/client-config';
export { clientConfigFromProperties, PROPERTY_NAMESPACE, type Properties } from './config/properties';

export * from './discovery/types';
export { ConfigurationServerList, parseServerEntry } from './discovery/configuration-server-list';
export { DiscoveryServerList, type DiscoveryServerListOptions } from './discovery/discovery-server-list';
export { StaticDiscoveryClient } from './discovery/static-discovery-client';

export { ServerRegistry, type RegistrySnapshot, type ServerRegistryOptions, type StaleEvent } from './registry/server-registry';

export type { HealthProbe } from './health/types';
export { NoOpProbe } from './health/no-op-probe';
export { HttpPingProbe, type HttpPingProbeOptions, type ProbeResult } from './health/http-ping-probe';
export { CircuitBreakerProbe } from './health/circuit-breaker-probe';
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker/circuit-breaker';

export type { FilterContext, SelectionFilter } from './filters/types';
export { PassThroughFilter } from './filters/pass-through';
export { ZonePreferenceFilter } from './filters/zone-preference';

export type { RuleContext, SelectionRule } from './rules/types';
export { ZoneAvoidanceRule, type ZoneAvoidanceOptions, type ZoneScore } from './rules/zone-avoidance';
export { RoundRobinRule } from './rules/round-robin';
export { RandomRule } from './rules/random';

export {
    ClientLoadBalancer,
    createLoadBalancer,
    type LoadBalancerDescription,
    type ServerChooser,
} from './load-balancer/load-balancer';
export { buildStrategies, type LoadBalancerStrategies, type StrategyDependencies } from './load-balancer/strategies';
export { ClientFactory, type ClientFactoryOptions } from './load-balancer/client-factory';

export {
    RequestRouter,
    isSecure,
    isSecureScheme,
    reconstructUri,
    type OutgoingRequest,
    type RoutedRequest,
} from './router/request-router';

export { createGateway, type GatewayOptions } from './gateway';
export { createBackend, type BackendOptions } from './backends';
