import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as winston from 'winston';

async function consoleTransport() {
    const mod = await import('../../../src/logging/logger');
    return mod.baseLogger.transports.find(t => t instanceof winston.transports.Console || t.constructor.name === 'Console');
}

describe('logging/silent-console-in-tests', () => {
    let oldEnv: string | undefined;

    beforeEach(() => {
        oldEnv = process.env.NODE_ENV;
    });

    afterEach(() => {
        if (oldEnv === undefined) {
            delete process.env.NODE_ENV;
        } else {
            process.env.NODE_ENV = oldEnv;
        }
        // Reset module cache so other tests import the default logger
        vi.resetModules();
    });

    it('creates console transport with silent=true when NODE_ENV=test', async () => {
        process.env.NODE_ENV = 'test';
        vi.resetModules();

        const transport = await consoleTransport();
        expect(transport).toBeDefined();
        expect(transport?.silent).toBe(true);
    });

    it('keeps console transport active when not in test env', async () => {
        process.env.NODE_ENV = 'development';
        vi.resetModules();

        const transport = await consoleTransport();
        expect(transport).toBeDefined();
        expect(transport?.silent).toBe(false);
    });
});
