import type { ContainerInspection, ContainerSnapshot } from '../../types/docker';

/**
 * The operations a discovery pass needs from the container runtime
 */
export interface RuntimeClient {
    listContainers(): Promise<ContainerSnapshot[]>;
    inspectContainer(id: string): Promise<ContainerInspection>;
    /** Runs a command in a container and returns its combined output. Rejects on a non-zero exit. */
    execInContainer(id: string, cmd: string[]): Promise<string>;
}

/**
 * Highest Docker Engine API version this client is known to work against.
 * A newer local CLI is ignored in favour of an unpinned client.
 */
export const MAX_SUPPORTED_API_VERSION = '1.43';

/** Where a host's docker binary shows up when the host root is mounted at /host */
export const HOST_DOCKER_BINARY = '/host/usr/local/bin/docker';
