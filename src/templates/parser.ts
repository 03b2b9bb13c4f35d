import yaml from 'js-yaml';
import type { FlexConfig } from '../types/flexConfig';
import { FlexConfigSchema } from '../types/flexConfig';
import type { Coordinates } from '../discovery/coordinates';
import { getErrorMessage } from '../utils/errors';

/** Placeholders filled in with the resolved address */
export const IP_PLACEHOLDERS = ['${auto:host}', '${auto:ip}'] as const;
/** Placeholder filled in with the resolved port */
export const PORT_PLACEHOLDER = '${auto:port}';

export const ALL_PLACEHOLDERS: readonly string[] = [...IP_PLACEHOLDERS, PORT_PLACEHOLDER];

/** Result of substituting coordinates into a template */
export type RenderResult = {
    text: string;
    /** Placeholders still present after substitution */
    missing: string[];
};

/**
 * Replace every coordinate placeholder that has a resolved value.
 * Placeholders whose value is unresolved are left in place and reported.
 */
export function renderTemplate(template: string, coordinates: Coordinates): RenderResult {
    let text = template;

    if (coordinates.ip) {
        for (const placeholder of IP_PLACEHOLDERS) {
            text = text.split(placeholder).join(coordinates.ip);
        }
    }
    if (coordinates.port) {
        text = text.split(PORT_PLACEHOLDER).join(coordinates.port);
    }

    const missing = ALL_PLACEHOLDERS.filter(placeholder => text.includes(placeholder));
    return { text, missing };
}

/**
 * Parse rendered template text as YAML into a probe configuration.
 * @throws Error if the text is not valid YAML or not a configuration mapping
 */
export function parseTemplate(text: string): FlexConfig {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (err) {
        throw new Error(`Template produced invalid YAML: ${getErrorMessage(err)}`);
    }

    const result = FlexConfigSchema.safeParse(raw);
    if (!result.success) {
        const reason = result.error.issues
            .map((issue) => {
                const where = issue.path.length ? issue.path.join('.') : 'value';
                return `${where} ${issue.message}`;
            })
            .join('; ');
        throw new Error(`Template is not a valid configuration: ${reason}`);
    }

    return result.data;
}
