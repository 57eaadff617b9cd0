import { classify } from './number_identity';
import { expand, DEFAULT_MAX_SPAN } from './range_expander';

export const ROUTING_KEY_PREFIX = 'nprn:routing:';

/**
 * Derived key set for one request.
 * Index i of every list denotes the same number.
 */
export interface PreviewResult {
    count: number;
    targets: string[];
    dns: string[];
    cacheKeys: string[];
}

/**
 * The preview as every operation echoes it back to the caller.
 */
export interface PreviewFields {
    count: number;
    expanded_targets: string[];
    expanded_dns: string[];
    expanded_redis_keys: string[];
}

export function routingKey(dn: string): string {
    return ROUTING_KEY_PREFIX + dn;
}

/**
 * Expands and classifies `expr`. Pure, no I/O.
 * The first element that fails classification aborts the whole preview.
 */
export function buildPreview(expr: string): PreviewResult {
    const targets: string[] = [];
    const dns: string[] = [];

    for (const element of expand(expr, DEFAULT_MAX_SPAN)) {
        const canonical = classify(element);
        targets.push(canonical.target);
        dns.push(canonical.dn);
    }

    return {
        count: targets.length,
        targets,
        dns,
        cacheKeys: dns.map(routingKey),
    };
}

export function toPreviewFields(preview: PreviewResult): PreviewFields {
    return {
        count: preview.count,
        expanded_targets: [...preview.targets],
        expanded_dns: [...preview.dns],
        expanded_redis_keys: [...preview.cacheKeys],
    };
}
