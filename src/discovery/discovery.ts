import type { DiscoveryArgs } from '../types/config';
import type { Directive } from '../types/directive';
import type { ContainerInspection, ContainerSnapshot } from '../types/docker';
import type { SynthesizedConfig, TemplateDocument } from '../types/flexConfig';
import type { RuntimeClient } from '../providers/docker';
import { createRuntimeClient, listContainersSafely } from '../providers/docker';
import { loadTemplates } from '../templates/store';
import type { CommandRunner } from '../utils/exec';
import { exec } from '../utils/exec';
import { getErrorMessage } from '../utils/errors';
import { zone } from '../logging/zone';
import { mergeAnnotations } from './annotations';
import { parseDirectives } from './directive';
import { ClaimSet, matchTarget } from './matcher';
import { identifySelf } from './selfIdentifier';
import { effectiveIpMode, resolveCoordinates } from './coordinates';
import { synthesizeConfig } from './synthesizer';
import { fanOut } from './fanout';

const log = zone('discovery');

export type PassSettings = Pick<
    DiscoveryArgs,
    'integrationName' | 'integrationNameShort' | 'containerId' | 'defaultIpMode' | 'overrideIpMode' | 'commandTimeoutMs'
>;

export type PassOptions = {
    args: PassSettings;
    runtime: RuntimeClient;
    templates: readonly TemplateDocument[];
    runCommand?: CommandRunner;
};

export type DiscoveryPassResult = {
    /** The agent's own container id, found or as given; empty when unknown */
    selfContainerId: string;
    containerCount: number;
    /** Same array the caller passed in as output, with this pass's configs appended */
    configs: SynthesizedConfig[];
};

type ForwardFinding = {
    inspection: ContainerInspection;
    directives: Directive[];
} | undefined;

/**
 * State of one discovery pass.
 *
 * Lookup tasks only fetch data; every decision that reads or writes the claim set,
 * the spent directives or the inspection cache happens in the result handlers,
 * one result at a time in arrival order.
 */
class DiscoveryPass {
    private claims = new ClaimSet();
    private spentDirectives = new Set<string>();
    private inspections = new Map<string, Promise<ContainerInspection | undefined>>();
    private jobs: Promise<void>[] = [];
    private runCommand: CommandRunner;

    constructor(
        private containers: readonly ContainerSnapshot[],
        private selfId: string,
        private options: PassOptions,
        private output: SynthesizedConfig[]
    ) {
        this.runCommand = options.runCommand ?? exec;
    }

    /**
     * Inspect a container at most once per pass. Failures are logged and cached as undefined.
     */
    private inspect(containerId: string): Promise<ContainerInspection | undefined> {
        let pending = this.inspections.get(containerId);
        if (!pending) {
            pending = this.options.runtime.inspectContainer(containerId).catch((err: unknown) => {
                log.debug({ message: 'Container inspect failed', data: { containerId, error: getErrorMessage(err) } });
                return undefined;
            });
            this.inspections.set(containerId, pending);
        }
        return pending;
    }

    private others(): ContainerSnapshot[] {
        return this.containers.filter(c => c.id !== this.selfId);
    }

    private schedule(directive: Directive, target: ContainerSnapshot): void {
        this.jobs.push(this.emit(directive, target));
    }

    private async emit(directive: Directive, target: ContainerSnapshot): Promise<void> {
        try {
            const inspection = await this.inspect(target.id);
            if (!inspection) {
                return;
            }

            const { args, runtime, templates } = this.options;
            const coordinates = await resolveCoordinates({
                snapshot: target,
                inspection,
                directive,
                ipMode: effectiveIpMode(directive, args),
                runtime,
                runCommand: this.runCommand,
                commandTimeoutMs: args.commandTimeoutMs,
            });

            const synthesized = synthesizeConfig(directive, target, coordinates, templates);
            if (synthesized) {
                this.output.push(synthesized);
            }
        } catch (err) {
            log.error({
                message: 'Failed to build dynamic config',
                data: { key: directive.key, containerId: target.id, error: getErrorMessage(err) }
            });
        }
    }

    private async drainJobs(): Promise<void> {
        const jobs = this.jobs;
        this.jobs = [];
        await Promise.all(jobs);
    }

    /**
     * The agent's own directives, matched against every other container.
     */
    async reverseLookup(): Promise<void> {
        if (!this.selfId) {
            log.debug({ message: 'Own container unknown, skipping reverse lookup' });
            return;
        }

        const selfInspection = await this.inspect(this.selfId);
        if (!selfInspection) {
            return;
        }

        const self = this.containers.find(c => c.id === this.selfId);
        const directives = parseDirectives(mergeAnnotations(self ?? { labels: {} }, selfInspection));
        if (directives.length === 0) {
            return;
        }

        log.debug({ message: 'Reverse lookup', data: { directives: directives.map(d => d.key) } });

        await fanOut(
            this.others(),
            (container) => this.inspect(container.id),
            (inspection, container) => {
                if (!inspection) return;

                for (const directive of directives) {
                    if (this.spentDirectives.has(directive.key)) continue;

                    if (matchTarget(directive, container, this.claims)) {
                        this.spentDirectives.add(directive.key);
                        this.schedule(directive, container);
                        break;
                    }
                }
            },
            'reverse lookup'
        );
        await this.drainJobs();
    }

    /**
     * Directives other containers carry. A directive targets its own container,
     * unless it sets r=true, in which case it is matched against the other containers.
     * A container that targeted itself is claimed once all its directives are scheduled.
     */
    async forwardLookup(): Promise<void> {
        const candidates = this.others().filter(c => !this.claims.has(c.id));

        await fanOut(
            candidates,
            async (container): Promise<ForwardFinding> => {
                const inspection = await this.inspect(container.id);
                if (!inspection) return undefined;
                return { inspection, directives: parseDirectives(mergeAnnotations(container, inspection)) };
            },
            (finding, container) => {
                if (!finding) return;

                if (this.claims.has(container.id)) {
                    log.debug({ message: 'Container already targeted, skipping its directives', data: { containerId: container.id } });
                    return;
                }

                let targetsItself = false;
                for (const directive of finding.directives) {
                    log.debug({ message: 'Forward lookup', data: { containerId: container.id, key: directive.key } });

                    if (!directive.reverse) {
                        this.schedule(directive, container);
                        targetsItself = true;
                        continue;
                    }

                    const target = this.others().find(c => c.id !== container.id && matchTarget(directive, c, this.claims));
                    if (target) {
                        this.schedule(directive, target);
                    }
                }

                // Its own directives are scheduled; r=true directives arriving later must not target it again
                if (targetsItself) {
                    this.claims.claim(container.id);
                }
            },
            'forward lookup'
        );
        await this.drainJobs();
    }
}

/**
 * Run one discovery pass over already enumerated containers.
 *
 * Configurations are appended to `output`, which is also returned in the result.
 * Which directive wins a container that two directives could match depends on
 * the order lookup results arrive in, and is not defined.
 */
export async function createDynamicContainerConfigs(
    containers: readonly ContainerSnapshot[],
    options: PassOptions,
    output: SynthesizedConfig[] = []
): Promise<DiscoveryPassResult> {
    const { args, templates } = options;
    const before = output.length;

    log.debug({ message: 'Starting discovery pass', data: { containers: containers.length, templates: templates.length } });

    const selfId = identifySelf(containers, args, args.containerId);
    const pass = new DiscoveryPass(containers, selfId, options, output);

    // Self -> other containers first, so forward lookup skips what it claimed
    await pass.reverseLookup();
    await pass.forwardLookup();

    log.info({
        message: 'Discovery pass complete',
        data: { containers: containers.length, selfContainerId: selfId, configs: output.length - before }
    });

    return { selfContainerId: selfId, containerCount: containers.length, configs: output };
}

export type DiscoveryDependencies = {
    runtime?: RuntimeClient;
    templates?: readonly TemplateDocument[];
    runCommand?: CommandRunner;
};

/**
 * Full discovery: connect to the runtime, enumerate containers, load templates and run a pass.
 * Never throws; a runtime that cannot be reached yields an empty result.
 */
export async function runDiscovery(
    args: DiscoveryArgs,
    deps: DiscoveryDependencies = {},
    output: SynthesizedConfig[] = []
): Promise<DiscoveryPassResult> {
    const empty: DiscoveryPassResult = { selfContainerId: args.containerId, containerCount: 0, configs: output };

    let runtime = deps.runtime;
    if (!runtime) {
        try {
            runtime = await createRuntimeClient({
                dockerApiVersion: args.dockerApiVersion,
                commandTimeoutMs: args.commandTimeoutMs,
                runCommand: deps.runCommand,
            });
        } catch (err) {
            log.error({ message: 'Unable to create container runtime client', data: { error: getErrorMessage(err) } });
            return empty;
        }
    }

    const containers = await listContainersSafely(runtime);
    if (containers.length === 0) {
        log.info({ message: 'No containers found, container discovery unavailable' });
        return empty;
    }

    const templates = deps.templates ?? await loadTemplates(args.templateDirectory);

    return createDynamicContainerConfigs(containers, {
        args,
        runtime,
        templates,
        runCommand: deps.runCommand,
    }, output);
}
