import { describe, it, expect } from 'vitest';
import { parseTemplate, renderTemplate } from '../../../src/templates/parser';

describe('templates/parser - renderTemplate', () => {
    it('replaces every occurrence of each placeholder', () => {
        const { text, missing } = renderTemplate(
            'url: http://${auto:ip}:${auto:port}\nhost: ${auto:host}\nagain: ${auto:host}',
            { ip: '10.0.0.4', port: '8080' }
        );

        expect(text).toBe('url: http://10.0.0.4:8080\nhost: 10.0.0.4\nagain: 10.0.0.4');
        expect(missing).toEqual([]);
    });

    it('leaves placeholders without a value in place and reports them', () => {
        const { text, missing } = renderTemplate('host: ${auto:host}\nport: ${auto:port}', { port: '6379' });

        expect(text).toBe('host: ${auto:host}\nport: 6379');
        expect(missing).toEqual(['${auto:host}']);
    });

    it('reports nothing for templates without placeholders', () => {
        expect(renderTemplate('name: static', {})).toEqual({ text: 'name: static', missing: [] });
    });
});

describe('templates/parser - parseTemplate', () => {
    it('parses a configuration and keeps unknown keys', () => {
        const config = parseTemplate('name: redisFlex\ncustom_attributes:\n  tier: 2\napis:\n  - name: redis\nextra: true\n');

        expect(config).toEqual({
            name: 'redisFlex',
            custom_attributes: { tier: '2' },
            apis: [{ name: 'redis' }],
            extra: true
        });
    });

    it('throws on invalid YAML', () => {
        expect(() => parseTemplate('apis: [unclosed')).toThrow(/^Template produced invalid YAML/);
    });

    it('throws when the document is not a mapping', () => {
        expect(() => parseTemplate('- just\n- a list\n')).toThrow(/^Template is not a valid configuration/);
    });

    it('throws when apis is not a list', () => {
        expect(() => parseTemplate('apis: redis\n')).toThrow('Template is not a valid configuration: apis');
    });
});
