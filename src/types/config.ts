import { z } from 'zod';
import { IP_MODES, isIpMode } from './directive';

export const DEFAULT_INTEGRATION_NAME = 'nri-flex';
export const DEFAULT_INTEGRATION_NAME_SHORT = 'flex';
export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

// Process-wide settings for a discovery pass, as read from flex-discovery.yml
export const DiscoveryArgsSchema = z.object({

    // Full and short names of this integration; used to spot the agent's own container
    integrationName: z.string().min(1).default(DEFAULT_INTEGRATION_NAME),
    integrationNameShort: z.string().min(1).default(DEFAULT_INTEGRATION_NAME_SHORT),

    // Id of the container the agent runs in, when already known
    containerId: z.string().default(''),

    defaultIpMode: z.enum(IP_MODES).default('private'),

    // Wins over the ip mode of every directive when set to a known mode; anything else is dropped
    overrideIpMode: z.preprocess(
        (value) => typeof value === 'string' && isIpMode(value) ? value : undefined,
        z.enum(IP_MODES).optional()
    ),

    // Upper bound for shell commands run during coordinate resolution
    commandTimeoutMs: z.number().int().positive().default(DEFAULT_COMMAND_TIMEOUT_MS),

    // Pin the Docker Engine API version instead of probing the local CLI
    dockerApiVersion: z.string().regex(/^\d+\.\d+$/, 'must look like 1.41').optional(),

    // Directory holding the named templates (e.g. redis.yml)
    templateDirectory: z.string().default('templates'),
});

export type DiscoveryArgs = z.infer<typeof DiscoveryArgsSchema>;
export type DiscoveryArgsInput = z.input<typeof DiscoveryArgsSchema>;
