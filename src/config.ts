import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import isDocker from 'is-docker';
import { DiscoveryArgs, DiscoveryArgsSchema } from './types/config';
import { isIpMode } from './types/directive';
import { getErrorMessage } from './utils/errors';
import { zone } from './logging/zone';

const log = zone('config');

// Configuration directory - use environment variable or sensible default
export const CONFIG_DIRECTORY = process.env.CONFIG_DIRECTORY || (isDocker() ? '/var/config/' : './config/');

export const CONFIG_FILE_NAME = 'flex-discovery.yml';

export function getDefaultConfigFile(): string {
    return path.join(CONFIG_DIRECTORY, CONFIG_FILE_NAME);
}

/**
 * Environment variables that take precedence over the config file.
 */
const ENV_OVERRIDES = {
    containerId: 'FLEX_CONTAINER_ID',
    overrideIpMode: 'FLEX_OVERRIDE_IP_MODE',
    dockerApiVersion: 'FLEX_DOCKER_API_VERSION',
} as const;

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
    const overrides: Record<string, string> = {};
    for (const [field, variable] of Object.entries(ENV_OVERRIDES)) {
        const value = env[variable];
        if (!value) continue;

        if (field === 'overrideIpMode' && !isIpMode(value)) {
            log.warn({ message: 'Ignoring unknown override ip mode', data: { variable, overrideIpMode: value } });
            continue;
        }
        overrides[field] = value;
    }
    return overrides;
}

function warnIgnoredOverride(raw: unknown): void {
    if (raw === null || typeof raw !== 'object' || !('overrideIpMode' in raw)) {
        return;
    }
    const value = raw.overrideIpMode;
    if (value !== undefined && value !== null && !(typeof value === 'string' && isIpMode(value))) {
        log.warn({ message: 'Ignoring unknown override ip mode', data: { overrideIpMode: value } });
    }
}

/**
 * Validate a raw configuration object and fill in defaults.
 * Throws with every schema issue listed.
 */
export function validateConfig(raw: unknown): DiscoveryArgs {
    warnIgnoredOverride(raw);

    const result = DiscoveryArgsSchema.safeParse(raw ?? {});
    if (result.success) {
        return result.data;
    }

    const reason = result.error.issues
        .map((issue) => {
            const where = issue.path.length ? issue.path.join('.') : 'value';
            return `${where} ${issue.message}`;
        })
        .join('; ');
    throw new Error(`Invalid configuration: ${reason}`);
}

/**
 * Load, merge with environment overrides and validate a configuration file.
 * A relative templateDirectory is resolved against the file's own directory.
 */
export async function loadConfigFile(configPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<DiscoveryArgs> {
    const file = configPath || getDefaultConfigFile();
    try {
        const fileContent = await fs.promises.readFile(file, 'utf-8');
        const parsed: unknown = yaml.load(fileContent);
        const base = parsed !== null && typeof parsed === 'object' ? parsed : {};

        const args = validateConfig({ ...base, ...readEnvOverrides(env) });
        return {
            ...args,
            templateDirectory: path.resolve(path.dirname(file), args.templateDirectory),
        };
    } catch (error) {
        throw new Error(`Error loading config file at ${file}: ${getErrorMessage(error)}`);
    }
}
