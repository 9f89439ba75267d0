/**
 * mysql-advisor - End-to-end CLI Tests
 *
 * Real argument parsing, option file, pipeline and reporter; only the
 * MySQL adapter is replaced by the in-memory one.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { main } from '../cli.js';
import { parseArgs } from '../cli/args.js';
import { FakeAdapter } from './mocks/index.js';

const mocks = vi.hoisted(() => ({
    adapters: [] as unknown[]
}));

vi.mock('../adapters/mysql/MySQLAdapter.js', async () => {
    const { FakeAdapter: InMemoryAdapter } = await import('./mocks/adapter.js');
    return {
        MySQLAdapter: class extends InMemoryAdapter {
            constructor() {
                super();
                mocks.adapters.push(this);
            }
        }
    };
});

describe('mysql-advisor CLI', () => {
    let dir: string;
    let optionFile: string;
    let output: string;

    beforeEach(async () => {
        mocks.adapters.length = 0;
        output = '';
        dir = await mkdtemp(path.join(tmpdir(), 'advisor-cli-'));
        optionFile = path.join(dir, 'client.cnf');
        await writeFile(optionFile, '[client]\nuser = advisor\npassword = test-secret\n');

        vi.spyOn(console, 'error').mockImplementation(() => {});
        vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
            output += String(chunk);
            return true;
        });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    const run = (...extra: string[]): Promise<void> =>
        main(parseArgs([
            '--mysql-host', 'db.internal',
            '--defaults-file', optionFile,
            '--forcemem', '8192',
            '--nocolor',
            ...extra
        ], {}));

    it('should print a full report for a healthy server', async () => {
        await run();

        const lines = output.split('\n');
        expect(lines).toContain('-------- General Statistics ' + '-'.repeat(50));
        expect(lines).toContain('[OK] Currently running supported MySQL version 5.0.45-log');
        expect(lines).toContain('[--] Reads / Writes: 70% / 30%');
        expect(lines).toContain('No additional performance recommendations are available.');
    });

    it('should connect with option file credentials and disconnect', async () => {
        await run();

        expect(mocks.adapters).toHaveLength(1);
        const adapter = mocks.adapters[0];
        expect(adapter).toBeInstanceOf(FakeAdapter);
        if (!(adapter instanceof FakeAdapter)) return;
        expect(adapter.connectCalls).toEqual([{
            type: 'mysql',
            host: 'db.internal',
            port: 3306,
            user: 'advisor',
            password: 'test-secret',
            connectTimeout: 10000
        }]);
        expect(adapter.disconnectCount).toBe(1);
    });

    it('should leave out OK findings with --nogood', async () => {
        await run('--nogood');

        const lines = output.split('\n');
        expect(lines.filter((line) => line.startsWith('[OK]'))).toEqual([]);
        expect(lines).toContain('[!!] Cannot calculate MyISAM index size - re-run with elevated privileges');
    });
});
