/**
 * Labels written by Kubernetes onto the containers it schedules.
 */
export const KUBE_CONTAINER_NAME_LABEL = 'io.kubernetes.container.name';
export const KUBE_CONTAINER_PORTS_LABEL = 'annotation.io.kubernetes.container.ports';

export type PortMapping = {
    privatePort: number;
    publicPort?: number;
    /** Host address the public port is published on */
    ip?: string;
    protocol: string;
};

/**
 * A container as seen by the runtime's list call. Immutable once enumerated.
 */
export type ContainerSnapshot = {
    readonly id: string;
    readonly names: readonly string[];
    readonly image: string;
    readonly labels: Readonly<Record<string, string>>;
    /** IP address per attached network, in the order the runtime reports them */
    readonly networks: Readonly<Record<string, string>>;
    readonly ports: readonly PortMapping[];
};

/**
 * Per-container detail that needs an inspect call.
 */
export type ContainerInspection = {
    id: string;
    /** 0 when the container is not running */
    pid: number;
    env: string[];
    labels: Record<string, string>;
    /** Keys such as "6379/tcp", in runtime order */
    exposedPorts: string[];
};
