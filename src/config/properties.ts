// ── Flat properties → raw client configuration ──────────────────
//
// Deployments often hand us flat key/value properties instead of
// nested objects. Keys are looked up per client first, then as a
// global default:
//
//   orders.lb.listOfServers = a:8080,b:8080   ← client "orders"
//   lb.refreshIntervalMs     = 15000           ← every client
//
// Values stay strings here; numeric keys that do not parse are
// passed through as-is so parseClientConfig reports them.

export type Properties = Readonly<Record<string, string | undefined>>;

export const PROPERTY_NAMESPACE = 'lb';

function lookup(properties: Properties, clientName: string, key: string): string | undefined {
    return (
        properties[`${clientName}.${PROPERTY_NAMESPACE}.${key}`] ??
        properties[`${PROPERTY_NAMESPACE}.${key}`]
    );
}

function toNumber(value: string): number | string {
    const trimmed = value.trim();
    const parsed = Number(trimmed);
    return trimmed.length > 0 && Number.isFinite(parsed) ? parsed : value;
}

function toBoolean(value: string): boolean | string {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    return value;
}

function toWeights(value: string): Record<string, number | string> {
    const weights: Record<string, number | string> = {};
    for (const pair of value.split(',')) {
        const [zone, weight] = pair.split('=').map((part) => part.trim());
        if (zone) weights[zone] = toNumber(weight ?? '');
    }
    return weights;
}

/**
 * Assemble the raw configuration for one client. The result still has to
 * go through parseClientConfig; mistyped values surface there.
 */
export function clientConfigFromProperties(clientName: string, properties: Properties): Record<string, unknown> {
    const get = (key: string): string | undefined => lookup(properties, clientName, key);
    const raw: Record<string, unknown> = { name: clientName };

    const numeric = (key: string, target: Record<string, unknown> = raw, targetKey: string = key): void => {
        const value = get(key);
        if (value !== undefined) target[targetKey] = toNumber(value);
    };

    numeric('refreshIntervalMs');
    numeric('refreshTimeoutMs');
    numeric('randomSeed');

    const zone = get('zone');
    if (zone !== undefined) raw.zone = zone.trim();

    const sourceType = get('source')?.trim() ?? 'configuration';
    if (sourceType === 'discovery') {
        const source: Record<string, unknown> = { type: 'discovery' };
        const serviceId = get('serviceId');
        if (serviceId !== undefined) source.serviceId = serviceId.trim();
        const useSecurePort = get('useSecurePort');
        if (useSecurePort !== undefined) source.useSecurePort = toBoolean(useSecurePort);
        raw.source = source;
    } else {
        raw.source = { type: sourceType, listOfServers: get('listOfServers') ?? [] };
    }

    const filterType = get('filter');
    if (filterType !== undefined) raw.filter = { type: filterType.trim() };

    const ruleType = get('rule');
    if (ruleType !== undefined) {
        const rule: Record<string, unknown> = { type: ruleType.trim() };
        numeric('availabilityThreshold', rule);
        const weights = get('zoneWeights');
        if (weights !== undefined) rule.zoneWeights = toWeights(weights);
        raw.rule = rule;
    }

    const probeType = get('probe');
    if (probeType !== undefined) {
        const probe: Record<string, unknown> = { type: probeType.trim() };
        const path = get('probePath');
        if (path !== undefined) probe.path = path.trim();
        numeric('probeTimeoutMs', probe, 'timeoutMs');
        numeric('probeCacheTtlMs', probe, 'cacheTtlMs');
        numeric('probeIntervalMs', probe, 'intervalMs');
        const secure = get('probeSecure');
        if (secure !== undefined) probe.secure = toBoolean(secure);
        numeric('failureThreshold', probe);
        numeric('resetTimeoutMs', probe);
        numeric('monitorWindowMs', probe);
        numeric('halfOpenMax', probe);
        raw.probe = probe;
    }

    return raw;
}
