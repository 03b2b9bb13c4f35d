import type { Directive, TargetType } from '../types/directive';
import { isIpMode } from '../types/directive';
import { zone } from '../logging/zone';

const log = zone('discovery.directive');

/** Substring that marks a label or environment key as a discovery annotation */
export const DISCOVERY_MARKER = 'flexDiscovery';

export const DEFAULT_TARGET_MODE = 'contains';

/**
 * Wire tokens for target types.
 * "cname" targets container names, "img" targets images.
 */
const TARGET_TYPE_TOKENS = new Map<string, TargetType>([
    ['cname', 'containerName'],
    ['img', 'image'],
]);

/** Raw field map of an annotation value, e.g. { t: 'redis', tm: 'contains' } */
export type DirectiveFields = Record<string, string>;

function splitPairs(value: string, separator: string, assign: string): DirectiveFields {
    const fields: DirectiveFields = {};
    for (const segment of value.split(separator)) {
        const pair = segment.split(assign);
        // Only segments with exactly one assignment character count
        if (pair.length === 2) {
            fields[pair[0]] = pair[1];
        }
    }
    return fields;
}

/**
 * Decodes an annotation value into its raw fields.
 *
 * Two encodings are supported:
 * - pair-list: `t=redis,tt=img,tm=contains`
 * - dotted, for label values that may not carry "," or "=" (Kubernetes): `t_redis.tt_img.tm_contains`
 */
export function decodeDirectiveFields(value: string): DirectiveFields {
    if (value.includes('=')) {
        return splitPairs(value, ',', '=');
    }
    if (value.includes('.')) {
        return splitPairs(value, '.', '_');
    }
    return {};
}

/**
 * Builds a typed directive from one annotation entry, applying defaults.
 * Returns undefined when the annotation names no target.
 */
export function parseDirective(key: string, value: string): Directive | undefined {
    const fields = decodeDirectiveFields(value);
    const target = fields.t;

    if (!target) {
        return undefined;
    }

    let targetType: TargetType | undefined = 'image';
    if (fields.tt !== undefined) {
        targetType = TARGET_TYPE_TOKENS.get(fields.tt);
        if (!targetType) {
            log.debug({ message: 'Unknown target type, directive will not match', data: { key, targetType: fields.tt } });
        }
    }

    const directive: Directive = {
        key,
        target,
        configName: fields.c || target,
        reverse: fields.r === 'true',
        targetType,
        targetMode: fields.tm || DEFAULT_TARGET_MODE,
    };

    if (isIpMode(fields.ip)) {
        directive.ipMode = fields.ip;
    }
    if (fields.p) {
        directive.port = fields.p;
    }

    return directive;
}

/**
 * Collects every directive carried by an annotation map, ordered by annotation key.
 */
export function parseDirectives(annotations: ReadonlyMap<string, string>): Directive[] {
    const directives: Directive[] = [];
    const keys = [...annotations.keys()].filter(key => key.includes(DISCOVERY_MARKER)).sort();

    for (const key of keys) {
        const value = annotations.get(key);
        if (value === undefined) continue;

        const directive = parseDirective(key, value);
        if (directive) {
            directives.push(directive);
        } else {
            log.debug({ message: 'Discovery annotation has no target, ignoring', data: { key } });
        }
    }

    return directives;
}
