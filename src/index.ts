#!/usr/bin/env node
import yaml from 'js-yaml';
import { loadConfigFile } from './config';
import { runDiscovery } from './discovery';
import { zone } from './logging/zone';
import { getErrorMessage } from './utils/errors';

export * from './types';
export { createDynamicContainerConfigs, runDiscovery } from './discovery';
export { loadConfigFile, validateConfig } from './config';

const log = zone('index');

/**
 * Run a single discovery pass and print each synthesized configuration
 * as one document of a YAML stream on stdout.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    try {
        const args = await loadConfigFile(argv[0]);
        const { configs, selfContainerId } = await runDiscovery(args);

        if (selfContainerId && selfContainerId !== args.containerId) {
            log.info({ message: 'Discovered own container', data: { containerId: selfContainerId } });
        }

        for (const { fileName, containerId, config } of configs) {
            log.debug({ message: 'Emitting config', data: { fileName, containerId } });
            process.stdout.write('---\n' + yaml.dump(config));
        }
        return 0;
    } catch (err) {
        log.error({ message: 'Discovery failed', data: { error: getErrorMessage(err) } });
        return 1;
    }
}

if (require.main === module) {
    main().then((code) => {
        process.exitCode = code;
    });
}
