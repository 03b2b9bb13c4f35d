import type { Directive } from '../types/directive';
import type { ContainerSnapshot } from '../types/docker';
import { KUBE_CONTAINER_NAME_LABEL } from '../types/docker';
import { zone } from '../logging/zone';

const log = zone('discovery.matcher');

const CONTAINER_NAME_PREFIX = /^\//;

/**
 * Removes the leading slash Docker puts in front of container names
 */
export function stripContainerName(name: string): string {
    return name.replace(CONTAINER_NAME_PREFIX, '');
}

/**
 * Compares a value against a wanted string using a match mode.
 * Unknown modes fall back to exact equality.
 */
export function kvFinder(mode: string, value: string, wanted: string): boolean {
    switch (mode) {
        case 'regex':
            try {
                return new RegExp(wanted).test(value);
            } catch {
                log.debug({ message: 'Invalid regex in match target', data: { pattern: wanted } });
                return false;
            }
        case 'prefix':
            return value.startsWith(wanted);
        case 'suffix':
            return value.endsWith(wanted);
        case 'contains':
            return value.includes(wanted);
        default:
            return value === wanted;
    }
}

/**
 * Container ids matched during one discovery pass.
 */
export class ClaimSet {
    private claimed = new Set<string>();

    has(containerId: string): boolean {
        return this.claimed.has(containerId);
    }

    claim(containerId: string): void {
        this.claimed.add(containerId);
    }

    get size(): number {
        return this.claimed.size;
    }
}

function candidateValues(directive: Directive, candidate: ContainerSnapshot): string[] {
    switch (directive.targetType) {
        case 'containerName': {
            const values = candidate.names.map(stripContainerName);
            const kubeName = candidate.labels[KUBE_CONTAINER_NAME_LABEL];
            if (kubeName !== undefined) {
                values.push(kubeName);
            }
            return values;
        }
        case 'image':
            return [candidate.image];
        default:
            return [];
    }
}

/**
 * Decides whether a candidate container is the one a directive points at.
 * A successful match claims the candidate; a claimed candidate never matches again.
 */
export function matchTarget(directive: Directive, candidate: ContainerSnapshot, claims: ClaimSet): boolean {
    if (claims.has(candidate.id)) {
        return false;
    }

    const matched = candidateValues(directive, candidate)
        .some(value => kvFinder(directive.targetMode, value, directive.target));

    if (matched) {
        claims.claim(candidate.id);
        log.debug({
            message: 'Target matched',
            data: { key: directive.key, target: directive.target, containerId: candidate.id }
        });
    }

    return matched;
}
