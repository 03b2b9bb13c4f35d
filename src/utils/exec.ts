/**
 * Command execution utilities
 *
 * Runs host commands (docker CLI, proc-file pipelines) with a time limit.
 * Never rejects: failures are reported through the result.
 */
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';

export interface ExecResult {
    success: boolean;
    stdout: string;
    stderr: string;
    /** Exit code, or null when the process was killed or never started */
    code: number | null;
    timedOut: boolean;
}

export interface ExecOptions {
    /** Applies to the whole process group, so every stage of a shell pipeline is stopped */
    timeoutMs?: number;
}

export type CommandRunner = (cmd: string[], options?: ExecOptions) => Promise<ExecResult>;

// On POSIX the command leads its own process group so a timeout can kill all of it
const USE_PROCESS_GROUP = process.platform !== 'win32';

function killCommand(child: ChildProcess): void {
    if (USE_PROCESS_GROUP && child.pid !== undefined) {
        try {
            process.kill(-child.pid, 'SIGKILL');
            return;
        } catch {
            // Group already gone
            child.kill('SIGKILL');
            return;
        }
    }
    child.kill('SIGKILL');
}

/**
 * Execute a command and collect its output
 */
export const exec: CommandRunner = (cmd, options = {}) => {
    const [file, ...args] = cmd;
    const { timeoutMs } = options;

    return new Promise((resolve) => {
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let timedOut = false;
        let settled = false;
        let timer: NodeJS.Timeout | undefined;

        const finish = (code: number | null, errorMessage?: string) => {
            if (settled) return;
            settled = true;
            if (timer) clearTimeout(timer);

            const out = Buffer.concat(stdout).toString('utf8');
            const err = Buffer.concat(stderr).toString('utf8');
            const success = code === 0 && !timedOut && errorMessage === undefined;
            resolve({
                success,
                stdout: out,
                stderr: err || errorMessage || '',
                code,
                timedOut,
            });
        };

        const child = spawn(file, args, {
            detached: USE_PROCESS_GROUP,
            windowsHide: true,
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
        child.on('error', (error) => finish(null, error.message));
        child.on('close', (code) => finish(code));

        if (timeoutMs !== undefined && timeoutMs > 0) {
            timer = setTimeout(() => {
                timedOut = true;
                killCommand(child);
            }, timeoutMs);
        }
    });
};
