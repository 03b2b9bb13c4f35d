import { z } from 'zod';
import type { Directive, IpMode } from '../types/directive';
import type { ContainerInspection, ContainerSnapshot } from '../types/docker';
import { KUBE_CONTAINER_PORTS_LABEL } from '../types/docker';
import type { RuntimeClient } from '../providers/docker/types';
import type { CommandRunner } from '../utils/exec';
import { getErrorMessage } from '../utils/errors';
import { zone } from '../logging/zone';

const log = zone('discovery.coordinates');

/** Dotted-quad IPv4 address, nothing before or after */
export const IPV4_PATTERN = /^(?:(?:25[0-5]|2[0-4]\d|[01]?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|[01]?\d?\d)$/;

const LOOPBACK = '127.0.0.1';

export type ResolveContext = {
    snapshot: ContainerSnapshot;
    inspection: ContainerInspection;
    directive: Directive;
    ipMode: IpMode;
    runtime: Pick<RuntimeClient, 'execInContainer'>;
    runCommand: CommandRunner;
    commandTimeoutMs: number;
};

export type Coordinates = {
    ip?: string;
    port?: string;
};

/**
 * One source of a coordinate. Returns undefined when it has nothing to offer.
 */
export type ResolverStep = {
    name: string;
    resolve: (ctx: ResolveContext) => string | undefined | Promise<string | undefined>;
};

function present(value: string | number | undefined | null): string | undefined {
    if (value === undefined || value === null) return undefined;
    const s = String(value).trim();
    return s === '' ? undefined : s;
}

/**
 * Picks the effective ip mode: a global override beats the directive, which beats the default.
 */
export function effectiveIpMode(
    directive: Pick<Directive, 'ipMode'>,
    settings: { overrideIpMode?: IpMode; defaultIpMode: IpMode }
): IpMode {
    return settings.overrideIpMode ?? directive.ipMode ?? settings.defaultIpMode;
}

/**
 * Returns the first whitespace-separated token of `output` that is a non-loopback IPv4 address.
 */
export function firstIpv4(output: string): string | undefined {
    return output
        .split(/\s+/)
        .map(token => token.trim())
        .find(token => token !== LOOPBACK && IPV4_PATTERN.test(token));
}

export function fibTrieCommand(pid: number): string[] {
    return [
        '/bin/sh',
        '-c',
        `cat /host/proc/${pid}/net/fib_trie | awk '/32 host/ { print f } {f=$2}' | grep -v ${LOOPBACK} | sort -u`,
    ];
}

const PortListSchema = z.array(
    z.object({ containerPort: z.union([z.number(), z.string()]).optional() }).passthrough()
);

/**
 * Reads the first containerPort out of a Kubernetes container-ports annotation.
 */
export function kubernetesPort(labelValue: string | undefined): string | undefined {
    if (labelValue === undefined) return undefined;

    let parsed: unknown;
    try {
        parsed = JSON.parse(labelValue);
    } catch (err) {
        log.debug({ message: 'Container ports annotation is not JSON', data: { error: getErrorMessage(err) } });
        return undefined;
    }

    const ports = PortListSchema.safeParse(parsed);
    if (!ports.success) {
        log.debug({ message: 'Container ports annotation has an unexpected shape', data: { value: labelValue } });
        return undefined;
    }

    for (const entry of ports.data) {
        const port = present(entry.containerPort);
        if (port) return port;
    }
    return undefined;
}

const modeIp: ResolverStep = {
    name: 'ipMode',
    resolve: ({ snapshot, ipMode }) => {
        if (ipMode === 'public') {
            return present(snapshot.ports[0]?.ip);
        }
        return Object.values(snapshot.networks).map(ip => present(ip)).find(Boolean);
    },
};

const lowLevelFetch: ResolverStep = {
    name: 'procFibTrie',
    resolve: async ({ inspection, runCommand, commandTimeoutMs, snapshot }) => {
        if (!inspection.pid) {
            log.debug({ message: 'Container has no process, skipping low level ip fetch', data: { containerId: snapshot.id } });
            return undefined;
        }

        log.info({ message: 'Attempting low level ip fetch', data: { containerId: snapshot.id, pid: inspection.pid } });
        const result = await runCommand(fibTrieCommand(inspection.pid), { timeoutMs: commandTimeoutMs });

        if (result.timedOut) {
            log.debug({ message: 'Low level ip fetch timed out', data: { containerId: snapshot.id, timeoutMs: commandTimeoutMs } });
            return undefined;
        }
        if (!result.success) {
            log.debug({ message: 'Low level ip fetch command failed', data: { code: result.code, output: result.stdout + result.stderr } });
            return undefined;
        }

        const ip = firstIpv4(result.stdout);
        if (ip) {
            log.info({ message: 'Low level ip fetch succeeded', data: { containerId: snapshot.id, ip } });
        } else {
            log.debug({ message: 'Low level ip fetch returned no address', data: { output: result.stdout.trim() } });
        }
        return ip;
    },
};

const hostnameExec: ResolverStep = {
    name: 'hostnameExec',
    resolve: async ({ runtime, snapshot }) => {
        try {
            const output = await runtime.execInContainer(snapshot.id, ['hostname', '-i']);
            return firstIpv4(output);
        } catch (err) {
            log.debug({ message: 'Secondary container ip fetch failed', data: { containerId: snapshot.id, error: getErrorMessage(err) } });
            return undefined;
        }
    },
};

const portOverride: ResolverStep = {
    name: 'directivePort',
    resolve: ({ directive }) => present(directive.port),
};

const modePort: ResolverStep = {
    name: 'ipMode',
    resolve: ({ snapshot, ipMode }) => {
        const mapping = snapshot.ports[0];
        if (!mapping) return undefined;
        return present(ipMode === 'public' ? mapping.publicPort : mapping.privatePort);
    },
};

const orchestratorPort: ResolverStep = {
    name: 'kubernetesAnnotation',
    resolve: ({ snapshot }) => kubernetesPort(snapshot.labels[KUBE_CONTAINER_PORTS_LABEL]),
};

const exposedPort: ResolverStep = {
    name: 'exposedPort',
    resolve: ({ inspection }) => {
        const first = inspection.exposedPorts[0];
        return first === undefined ? undefined : present(first.split('/')[0]);
    },
};

export const IP_STEPS: readonly ResolverStep[] = [modeIp, lowLevelFetch, hostnameExec];
export const PORT_STEPS: readonly ResolverStep[] = [portOverride, modePort, orchestratorPort, exposedPort];

/**
 * Runs steps in order and returns the first value one of them produces.
 */
export async function firstResolved(steps: readonly ResolverStep[], ctx: ResolveContext): Promise<string | undefined> {
    for (const step of steps) {
        const value = await step.resolve(ctx);
        if (value !== undefined) {
            log.debug({ message: 'Coordinate resolved', data: { step: step.name, value, containerId: ctx.snapshot.id } });
            return value;
        }
    }
    return undefined;
}

/**
 * Resolves the address and port a probe should use to reach a matched container.
 * Fields no step could resolve are left undefined.
 */
export async function resolveCoordinates(ctx: ResolveContext): Promise<Coordinates> {
    const ip = await firstResolved(IP_STEPS, ctx);
    const port = await firstResolved(PORT_STEPS, ctx);
    return { ip, port };
}
