import { z } from 'zod';

// Shape of a probe configuration document once its placeholders are filled in.
// Only the keys the discovery engine touches are modelled; everything else is kept as-is.
export const FlexConfigSchema = z.object({
    name: z.string().optional(),

    // Attributes attached to every sample the probe emits. Scalars are stored as strings.
    custom_attributes: z.record(z.string(), z.coerce.string()).optional(),

    global: z.record(z.string(), z.unknown()).optional(),

    apis: z.array(z.record(z.string(), z.unknown())).optional(),
}).passthrough();

export type FlexConfig = z.infer<typeof FlexConfigSchema>;

/**
 * A configuration produced for one discovered container.
 */
export type SynthesizedConfig = {
    /** Template the configuration was rendered from, e.g. "redis.yml" */
    fileName: string;
    containerId: string;
    config: FlexConfig;
};

/**
 * A named template document as loaded from disk.
 */
export type TemplateDocument = {
    fileName: string;
    rawText: string;
};
