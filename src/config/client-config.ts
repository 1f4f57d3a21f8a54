import { z } from 'zod';
import { InvalidConfigurationError } from '../errors';

// =================================================================
// CLIENT CONFIGURATION
// =================================================================
//
// One named bundle per logical client. Validated once, at the
// moment a load balancer is built; a bad bundle never gets as far
// as serving a request.
//
//   {
//     name: 'orders',
//     zone: 'us-east-1a',
//     source: { type: 'discovery', serviceId: 'orders-svc' },
//     rule:   { type: 'zone-avoidance', availabilityThreshold: 0.5 },
//     probe:  { type: 'http', path: '/health' },
//   }
// =================================================================

export const DEFAULT_REFRESH_INTERVAL_MS = 30_000;
export const DEFAULT_REFRESH_TIMEOUT_MS = 5_000;
export const DEFAULT_AVAILABILITY_THRESHOLD = 0.5;

const ListOfServersSchema = z
    .union([z.string(), z.array(z.string())])
    .transform((value) => (typeof value === 'string' ? value.split(',') : value))
    .transform((entries) => entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0));

export const SourceConfigSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('configuration'),
        listOfServers: ListOfServersSchema.default([]),
    }),
    z.object({
        type: z.literal('discovery'),
        serviceId: z.string().min(1).optional(),
        useSecurePort: z.boolean().default(false),
    }),
]);

export const FilterConfigSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('zone-preference'),
        zone: z.string().min(1).optional(),
    }),
    z.object({ type: z.literal('pass-through') }),
]);

export const RuleConfigSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('zone-avoidance'),
        availabilityThreshold: z
            .number({ required_error: 'zone-avoidance requires availabilityThreshold' })
            .gt(0, 'must be > 0')
            .max(1, 'must be <= 1'),
        zoneWeights: z.record(z.number().min(0, 'must be >= 0')).optional(),
    }),
    z.object({ type: z.literal('round-robin') }),
    z.object({ type: z.literal('random') }),
]);

export const ProbeConfigSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('no-op') }),
    z.object({
        type: z.literal('http'),
        path: z.string().startsWith('/', 'must start with "/"').default('/'),
        timeoutMs: z.number().int().positive('must be positive').default(2_000),
        cacheTtlMs: z.number().int().min(0, 'must be >= 0').default(10_000),
        intervalMs: z.number().int().positive('must be positive').default(10_000),
        secure: z.boolean().default(false),
    }),
    z.object({
        type: z.literal('circuit-breaker'),
        failureThreshold: z.number().int().min(1, 'must be >= 1').default(3),
        resetTimeoutMs: z.number().int().positive('must be positive').default(30_000),
        monitorWindowMs: z.number().int().positive('must be positive').default(10_000),
        halfOpenMax: z.number().int().min(1, 'must be >= 1').default(1),
    }),
]);

export const ClientConfigSchema = z
    .object({
        name: z.string().min(1, 'Client name cannot be empty'),
        refreshIntervalMs: z.number().int().positive('must be positive').default(DEFAULT_REFRESH_INTERVAL_MS),
        refreshTimeoutMs: z.number().int().positive('must be positive').optional(),
        zone: z.string().min(1).optional(),
        source: SourceConfigSchema.default({ type: 'configuration' }),
        filter: FilterConfigSchema.default({ type: 'zone-preference' }),
        rule: RuleConfigSchema.default({
            type: 'zone-avoidance',
            availabilityThreshold: DEFAULT_AVAILABILITY_THRESHOLD,
        }),
        probe: ProbeConfigSchema.default({ type: 'no-op' }),
        randomSeed: z.number().int().optional(),
    })
    .refine((config) => (
        config.refreshTimeoutMs === undefined || config.refreshTimeoutMs <= config.refreshIntervalMs
    ), {
        message: 'must be <= refreshIntervalMs',
        path: ['refreshTimeoutMs'],
    })
    // An unset timeout never outlives the interval
    .transform((config) => ({
        ...config,
        refreshTimeoutMs: config.refreshTimeoutMs ?? Math.min(DEFAULT_REFRESH_TIMEOUT_MS, config.refreshIntervalMs),
    }));

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;
export type SourceConfig = ClientConfig['source'];
export type FilterConfig = ClientConfig['filter'];
export type RuleConfig = ClientConfig['rule'];
export type ProbeConfig = ClientConfig['probe'];

/**
 * Validate a raw bundle and fill in defaults.
 * Throws InvalidConfigurationError listing every issue found.
 */
export function parseClientConfig(input: unknown): ClientConfig {
    const result = ClientConfigSchema.safeParse(input);
    if (result.success) return result.data;

    const issues = result.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
    });
    const name = typeof input === 'object' && input !== null && 'name' in input ? String(input.name) : '?';

    throw new InvalidConfigurationError(`Invalid configuration for client "${name}": ${issues.join('; ')}`, issues);
}
