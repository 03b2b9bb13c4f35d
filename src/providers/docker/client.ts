import Docker from 'dockerode';
import type { Duplex } from 'stream';
import type { ContainerInspection, ContainerSnapshot } from '../../types/docker';
import type { CommandRunner } from '../../utils/exec';
import { exec } from '../../utils/exec';
import { getErrorMessage } from '../../utils/errors';
import { zone } from '../../logging/zone';
import type { RuntimeClient } from './types';
import { HOST_DOCKER_BINARY, MAX_SUPPORTED_API_VERSION } from './types';
import { toInspection, toSnapshot } from './snapshot';

const log = zone('providers.docker');

const VERSION_QUERY = ['version', '--format', '{{json .Client.APIVersion}}'];

/**
 * RuntimeClient backed by the Docker Engine API
 */
export class DockerRuntimeClient implements RuntimeClient {
    private docker: Docker;

    constructor(docker?: Docker) {
        this.docker = docker || new Docker();
    }

    async listContainers(): Promise<ContainerSnapshot[]> {
        const containers = await this.docker.listContainers();
        return containers.map(toSnapshot);
    }

    async inspectContainer(id: string): Promise<ContainerInspection> {
        const info = await this.docker.getContainer(id).inspect();
        return toInspection(info);
    }

    async execInContainer(id: string, cmd: string[]): Promise<string> {
        const execution = await this.docker.getContainer(id).exec({
            Cmd: cmd,
            AttachStdout: true,
            AttachStderr: true,
            // A TTY keeps stdout and stderr in one un-multiplexed stream
            Tty: true,
        });

        const stream = await execution.start({ hijack: true, stdin: false, Tty: true });
        const output = await readStream(stream);

        const { ExitCode } = await execution.inspect();
        if (ExitCode !== 0 && ExitCode !== null) {
            throw new Error(`command "${cmd.join(' ')}" exited with code ${ExitCode}: ${output.trim()}`);
        }
        return output;
    }
}

function readStream(stream: Duplex): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        stream.on('data', (chunk: Buffer) => chunks.push(chunk));
        stream.on('error', reject);
        stream.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    });
}

/**
 * Compares two "major.minor" API versions
 */
export function compareApiVersions(a: string, b: string): number {
    const [aMajor = 0, aMinor = 0] = a.split('.').map(Number);
    const [bMajor = 0, bMinor = 0] = b.split('.').map(Number);
    return aMajor !== bMajor ? aMajor - bMajor : aMinor - bMinor;
}

/**
 * Asks the local docker CLI which API version it speaks.
 * Tries the docker on PATH first, then the host's binary mounted under /host.
 */
export async function probeClientApiVersion(
    runCommand: CommandRunner = exec,
    platform: NodeJS.Platform = process.platform,
    timeoutMs?: number
): Promise<string | undefined> {
    const candidates = platform === 'win32'
        ? [['cmd', '/C', 'docker', ...VERSION_QUERY]]
        : [['docker', ...VERSION_QUERY], [HOST_DOCKER_BINARY, ...VERSION_QUERY]];

    for (const cmd of candidates) {
        const result = await runCommand(cmd, { timeoutMs });
        if (!result.success) {
            log.debug({ message: 'Docker version query failed', data: { command: cmd[0], error: result.stderr.trim() } });
            continue;
        }

        const version = result.stdout.replace(/"/g, '').trim();
        if (/^\d+\.\d+$/.test(version)) {
            return version;
        }
        log.debug({ message: 'Docker version query returned an unexpected value', data: { output: version } });
    }

    return undefined;
}

/**
 * Works out which API version to pin the client to, if any.
 * An explicit version always wins; a probed one is only used when this client supports it.
 */
export async function selectApiVersion(
    pinned: string | undefined,
    runCommand: CommandRunner = exec,
    platform: NodeJS.Platform = process.platform,
    timeoutMs?: number
): Promise<string | undefined> {
    if (pinned) {
        return pinned;
    }

    const probed = await probeClientApiVersion(runCommand, platform, timeoutMs);
    if (!probed) {
        log.debug({ message: 'Unable to fetch Docker API version, using an unpinned client' });
        return undefined;
    }

    if (compareApiVersions(probed, MAX_SUPPORTED_API_VERSION) > 0) {
        log.debug({
            message: 'Docker client API version is newer than supported, using an unpinned client',
            data: { probed, supported: MAX_SUPPORTED_API_VERSION }
        });
        return undefined;
    }

    log.debug({ message: 'Pinning Docker API version', data: { version: probed } });
    return probed;
}

export type RuntimeClientOptions = {
    dockerApiVersion?: string;
    commandTimeoutMs?: number;
    runCommand?: CommandRunner;
};

/**
 * Builds a Docker-backed runtime client, pinned to a compatible API version where one is known
 */
export async function createRuntimeClient(options: RuntimeClientOptions = {}): Promise<RuntimeClient> {
    const version = await selectApiVersion(
        options.dockerApiVersion,
        options.runCommand ?? exec,
        process.platform,
        options.commandTimeoutMs
    );
    const docker = version ? new Docker({ version: `v${version}` }) : new Docker();
    return new DockerRuntimeClient(docker);
}

/**
 * Enumerates running containers. Any failure is logged and reported as no containers.
 */
export async function listContainersSafely(client: RuntimeClient): Promise<ContainerSnapshot[]> {
    try {
        return await client.listContainers();
    } catch (err) {
        log.error({ message: 'Failed to list containers', data: { error: getErrorMessage(err) } });
        return [];
    }
}
