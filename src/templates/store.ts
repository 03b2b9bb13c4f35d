import fs from 'fs';
import path from 'path';
import type { TemplateDocument } from '../types/flexConfig';
import { zone } from '../logging/zone';
import { getErrorMessage } from '../utils/errors';

const log = zone('templates.store');

const TEMPLATE_EXTENSIONS = new Set(['.yml', '.yaml']);

/**
 * Load every YAML template in a directory, sorted by file name.
 * Unreadable files are logged and left out; a missing directory yields no templates.
 */
export async function loadTemplates(directory: string): Promise<TemplateDocument[]> {
    let entries: fs.Dirent[];
    try {
        entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (err) {
        log.error({ message: 'Failed to read template directory', data: { directory, error: getErrorMessage(err) } });
        return [];
    }

    const fileNames = entries
        .filter(entry => entry.isFile() && TEMPLATE_EXTENSIONS.has(path.extname(entry.name)))
        .map(entry => entry.name)
        .sort();

    const templates: TemplateDocument[] = [];
    for (const fileName of fileNames) {
        try {
            const rawText = await fs.promises.readFile(path.join(directory, fileName), 'utf-8');
            templates.push({ fileName, rawText });
        } catch (err) {
            log.error({ message: 'Failed to read template', data: { directory, fileName, error: getErrorMessage(err) } });
        }
    }

    log.debug({ message: 'Loaded templates', data: { directory, count: templates.length } });
    return templates;
}

/**
 * Find the template a directive's config name refers to ("redis" -> "redis.yml").
 */
export function findTemplate(templates: readonly TemplateDocument[], configName: string): TemplateDocument | undefined {
    const fileName = `${configName}.yml`;
    return templates.find(t => t.fileName === fileName);
}
