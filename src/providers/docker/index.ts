/**
 * Docker Provider - the container runtime behind a discovery pass
 */

export {
    DockerRuntimeClient,
    createRuntimeClient,
    listContainersSafely,
    probeClientApiVersion,
    selectApiVersion
} from './client';
export type { RuntimeClientOptions } from './client';

export type { RuntimeClient } from './types';
export { MAX_SUPPORTED_API_VERSION } from './types';

export { toInspection, toSnapshot } from './snapshot';
