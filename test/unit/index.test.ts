import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { main } from '../../src/index';
import { loadConfigFile, validateConfig } from '../../src/config';
import { runDiscovery } from '../../src/discovery';

vi.mock('../../src/config', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../../src/config')>();
    return { ...actual, loadConfigFile: vi.fn() };
});

vi.mock('../../src/discovery', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../../src/discovery')>();
    return { ...actual, runDiscovery: vi.fn() };
});

describe('main', () => {
    let written: string[];

    beforeEach(() => {
        written = [];
        vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
            written.push(String(chunk));
            return true;
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prints every configuration as a YAML document', async () => {
        vi.mocked(loadConfigFile).mockResolvedValue(validateConfig({}));
        vi.mocked(runDiscovery).mockResolvedValue({
            selfContainerId: '',
            containerCount: 2,
            configs: [
                { fileName: 'redis.yml', containerId: 'one', config: { name: 'redisFlex' } },
                { fileName: 'nginx.yml', containerId: 'two', config: { name: 'nginxFlex', custom_attributes: { IDShort: 'two' } } },
            ],
        });

        expect(await main(['/etc/flex/flex-discovery.yml'])).toBe(0);

        expect(loadConfigFile).toHaveBeenCalledWith('/etc/flex/flex-discovery.yml');
        expect(written).toEqual([
            '---\nname: redisFlex\n',
            '---\nname: nginxFlex\ncustom_attributes:\n  IDShort: two\n',
        ]);
    });

    it('exits with 1 when the configuration cannot be loaded', async () => {
        vi.mocked(loadConfigFile).mockRejectedValue(new Error('Error loading config file at missing.yml: ENOENT'));

        expect(await main(['missing.yml'])).toBe(1);
        expect(written).toEqual([]);
    });
});
