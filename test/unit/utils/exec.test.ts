import { describe, it, expect } from 'vitest';
import { exec } from '../../../src/utils/exec';

describe('utils/exec', () => {
    it('collects stdout of a successful command', async () => {
        const result = await exec(['/bin/sh', '-c', 'echo 172.17.0.5']);

        expect(result).toEqual({ success: true, stdout: '172.17.0.5\n', stderr: '', code: 0, timedOut: false });
    });

    it('reports the exit code and stderr of a failing command', async () => {
        const result = await exec(['/bin/sh', '-c', 'echo no such file >&2; exit 3']);

        expect(result).toEqual({ success: false, stdout: '', stderr: 'no such file\n', code: 3, timedOut: false });
    });

    it('reports a command that cannot be started', async () => {
        const result = await exec(['/nonexistent/flex-discovery-command']);

        expect(result.success).toBe(false);
        expect(result.code).toBeNull();
        expect(result.timedOut).toBe(false);
        expect(result.stderr).toContain('ENOENT');
    });

    it('stops a command that runs past its time limit', async () => {
        const result = await exec(['/bin/sh', '-c', 'sleep 5'], { timeoutMs: 50 });

        expect(result.timedOut).toBe(true);
        expect(result.success).toBe(false);
        expect(result.code).toBeNull();
    });

    it('stops every stage of a pipeline on timeout', async () => {
        const started = Date.now();

        const result = await exec(['/bin/sh', '-c', 'sleep 5 | sleep 5'], { timeoutMs: 50 });

        expect(result.timedOut).toBe(true);
        expect(Date.now() - started).toBeLessThan(2000);
    });
});
