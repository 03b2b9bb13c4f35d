import type { ContainerSnapshot } from '../types/docker';
import { KUBE_CONTAINER_NAME_LABEL } from '../types/docker';
import { stripContainerName } from './matcher';
import { zone } from '../logging/zone';

const log = zone('discovery.self');

export type IntegrationIdentity = {
    integrationName: string;
    integrationNameShort: string;
};

type SelfHeuristic = {
    name: string;
    test: (container: ContainerSnapshot, identity: IntegrationIdentity) => boolean;
};

// Tried in order; a later heuristic only runs when every earlier one found nothing
const HEURISTICS: SelfHeuristic[] = [
    {
        name: 'image',
        test: (c, id) => c.image.includes(id.integrationName),
    },
    {
        name: 'containerName',
        test: (c, id) => c.names.some(n => stripContainerName(n).includes(id.integrationNameShort)),
    },
    {
        name: 'kubernetesLabel',
        test: (c, id) => (c.labels[KUBE_CONTAINER_NAME_LABEL] ?? '').includes(id.integrationNameShort),
    },
];

/**
 * Finds the container the agent itself runs in.
 *
 * A known id is returned untouched. Otherwise each heuristic is applied to every
 * container; the first container (in enumeration order) satisfying the first
 * productive heuristic wins. Returns an empty string when nothing matches.
 */
export function identifySelf(
    containers: readonly ContainerSnapshot[],
    identity: IntegrationIdentity,
    knownId = ''
): string {
    if (knownId) {
        return knownId;
    }

    log.debug({
        message: 'Own container id unknown, looking for integration image or container name',
        data: { integrationName: identity.integrationName, integrationNameShort: identity.integrationNameShort }
    });

    for (const heuristic of HEURISTICS) {
        const found = containers.find(c => heuristic.test(c, identity));
        if (found) {
            log.debug({ message: 'Own container found', data: { containerId: found.id, heuristic: heuristic.name } });
            return found.id;
        }
    }

    log.debug({ message: 'Unable to find own container id' });
    return '';
}
