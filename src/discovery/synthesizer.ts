import type { Directive } from '../types/directive';
import type { ContainerSnapshot } from '../types/docker';
import type { FlexConfig, SynthesizedConfig, TemplateDocument } from '../types/flexConfig';
import type { Coordinates } from './coordinates';
import { findTemplate } from '../templates/store';
import { parseTemplate, renderTemplate } from '../templates/parser';
import { getErrorMessage } from '../utils/errors';
import { zone } from '../logging/zone';

const log = zone('discovery.synthesizer');

export const SHORT_ID_LENGTH = 12;

/**
 * Copy the target container's labels and identity into the config's custom attributes.
 * Identity attributes win over labels of the same name.
 */
export function decorateConfig(config: FlexConfig, container: ContainerSnapshot): FlexConfig {
    return {
        ...config,
        custom_attributes: {
            ...(config.custom_attributes ?? {}),
            ...container.labels,
            containerID: container.id,
            image: container.image,
            IDShort: container.id.slice(0, SHORT_ID_LENGTH),
        },
    };
}

/**
 * Materialize the configuration a directive asks for, for the container it matched.
 * Returns undefined, after logging why, when the template is missing, a placeholder
 * could not be filled or the result does not parse.
 */
export function synthesizeConfig(
    directive: Directive,
    container: ContainerSnapshot,
    coordinates: Coordinates,
    templates: readonly TemplateDocument[]
): SynthesizedConfig | undefined {
    const template = findTemplate(templates, directive.configName);
    if (!template) {
        log.debug({
            message: 'No template matches config name',
            data: { key: directive.key, configName: directive.configName, containerId: container.id }
        });
        return undefined;
    }

    log.debug({ message: 'Container matched template', data: { containerId: container.id, fileName: template.fileName } });

    const { text, missing } = renderTemplate(template.rawText, coordinates);
    if (missing.length > 0) {
        log.warn({
            message: 'Missing variable, unable to create dynamic config',
            data: {
                containerId: container.id,
                image: container.image,
                fileName: template.fileName,
                missing,
                ip: coordinates.ip ?? '',
                port: coordinates.port ?? ''
            }
        });
        return undefined;
    }

    let parsed: FlexConfig;
    try {
        parsed = parseTemplate(text);
    } catch (err) {
        log.error({
            message: 'Unable to parse rendered template',
            data: { fileName: template.fileName, error: getErrorMessage(err), text }
        });
        return undefined;
    }

    return {
        fileName: template.fileName,
        containerId: container.id,
        config: decorateConfig(parsed, container),
    };
}
