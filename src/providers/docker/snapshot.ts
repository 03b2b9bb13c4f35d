import type Docker from 'dockerode';
import type { ContainerInspection, ContainerSnapshot, PortMapping } from '../../types/docker';

function toPortMapping(port: Docker.Port): PortMapping {
    return {
        privatePort: port.PrivatePort,
        publicPort: port.PublicPort || undefined,
        ip: port.IP || undefined,
        protocol: port.Type,
    };
}

/**
 * Converts a container from `docker ps` into a snapshot
 */
export function toSnapshot(info: Docker.ContainerInfo): ContainerSnapshot {
    const networks: Record<string, string> = {};
    for (const [name, network] of Object.entries(info.NetworkSettings?.Networks ?? {})) {
        networks[name] = network.IPAddress;
    }

    return {
        id: info.Id,
        names: info.Names ?? [],
        image: info.Image,
        labels: info.Labels ?? {},
        networks,
        ports: (info.Ports ?? []).map(toPortMapping),
    };
}

/**
 * Converts `docker inspect` output into the fields discovery reads
 */
export function toInspection(info: Docker.ContainerInspectInfo): ContainerInspection {
    return {
        id: info.Id,
        pid: info.State?.Pid ?? 0,
        env: info.Config?.Env ?? [],
        labels: info.Config?.Labels ?? {},
        exposedPorts: Object.keys(info.Config?.ExposedPorts ?? {}),
    };
}
