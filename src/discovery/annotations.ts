import type { ContainerInspection, ContainerSnapshot } from '../types/docker';

/**
 * Splits a "KEY=VALUE" assignment on the first "=".
 * Returns undefined for entries without one.
 */
export function splitAssignment(entry: string): [string, string] | undefined {
    const index = entry.indexOf('=');
    if (index === -1) {
        return undefined;
    }
    return [entry.slice(0, index), entry.slice(index + 1)];
}

/**
 * Flattens a container's labels and, when inspected, its labels and environment
 * into one map. Later sources overwrite earlier ones on key collision.
 */
export function mergeAnnotations(
    snapshot: Pick<ContainerSnapshot, 'labels'>,
    inspection?: Pick<ContainerInspection, 'labels' | 'env'>
): Map<string, string> {
    const annotations = new Map<string, string>(Object.entries(snapshot.labels));

    if (!inspection) {
        return annotations;
    }

    for (const [key, value] of Object.entries(inspection.labels)) {
        annotations.set(key, value);
    }

    for (const entry of inspection.env) {
        const pair = splitAssignment(entry);
        if (pair) {
            annotations.set(pair[0], pair[1]);
        }
    }

    return annotations;
}
