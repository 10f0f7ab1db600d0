import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { realpath } from 'node:fs/promises';
import { ProcessInvoker, formatCommand } from '../../src/process/invoker.js';
import { makeTempDir, removeDir } from '../fixtures/context.js';

const node = process.execPath;

describe('ProcessInvoker', () => {
    const invoker = new ProcessInvoker({ timeoutSeconds: 10 });

    it('returns trimmed stdout on success', async () => {
        const result = await invoker.run(node, ['-e', 'process.stdout.write("  hello  \\n")']);

        expect(result.success).toBe(true);
        expect(result.stdout).toBe('hello');
        expect(result.exitCode).toBe(0);
        expect(result.error).toBeNull();
    });

    it('uses stderr as the error of a non-zero exit', async () => {
        const result = await invoker.run(node, ['-e', 'process.stderr.write("boom\\n"); process.exit(3)']);

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.code).toBe('NON_ZERO_EXIT');
        expect(result.error).toBe('boom');
        expect(result.exitCode).toBe(3);
    });

    it('falls back to the exit code when stderr is empty', async () => {
        const result = await invoker.run(node, ['-e', 'process.exit(2)']);

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.error).toBe('Process exited with code 2');
    });

    it('reports a missing executable as not installed', async () => {
        const result = await invoker.run('assistant-test-no-such-tool', ['--version']);

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.code).toBe('TOOL_NOT_INSTALLED');
        expect(result.error).toBe('"assistant-test-no-such-tool" is not installed or could not be started');
        expect(result.exitCode).toBeNull();
    });

    it('kills the process when the timeout elapses', async () => {
        const result = await invoker.run(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutSeconds: 0.2 });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.code).toBe('TIMEOUT');
        expect(result.error).toBe('Command timed out after 0.2s');
    });

    it('rounds a sub-millisecond timeout up instead of disabling it', async () => {
        const result = await invoker.run(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutSeconds: 0.0004 });

        expect(result).toMatchObject({ success: false, code: 'TIMEOUT', error: 'Command timed out after 0.0004s', exitCode: null });
    });

    it('times out the same way on every run', async () => {
        const run = () => invoker.run(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutSeconds: 0.2 });

        const first = await run();
        const second = await run();

        const expected = {
            success: false, code: 'TIMEOUT', error: 'Command timed out after 0.2s',
            exitCode: null, stdout: '', stderr: '',
        };
        expect(first).toMatchObject(expected);
        expect(second).toMatchObject(expected);
    });

    it('returns a failure for arguments Node refuses to pass', async () => {
        const result = await invoker.run(node, ['-e', 'a\u0000b']);

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.code).toBe('NON_ZERO_EXIT');
        expect(result.error).toContain('null bytes');
        expect(result.exitCode).toBeNull();
    });

    it('closes stdin right away', async () => {
        const script = 'process.stdin.resume(); process.stdin.on("end", () => process.stdout.write("eof"))';
        const result = await invoker.run(node, ['-e', script]);

        expect(result.stdout).toBe('eof');
    });

    describe('cwd', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await makeTempDir();
        });

        afterEach(async () => {
            await removeDir(dir);
        });

        it('blames a missing working directory, not the executable', async () => {
            const missing = `${dir}/gone`;

            const result = await invoker.run(node, ['--version'], { cwd: missing });

            expect(result).toMatchObject({
                success: false,
                code: 'NON_ZERO_EXIT',
                error: `Working directory not found: ${missing}`,
                exitCode: null,
            });
        });

        it('runs in the given working directory', async () => {
            const result = await invoker.run(node, ['-e', 'process.stdout.write(process.cwd())'], { cwd: dir });

            expect(await realpath(result.stdout)).toBe(await realpath(dir));
        });
    });
});

describe('formatCommand', () => {
    it('quotes arguments with whitespace and empty arguments', () => {
        expect(formatCommand('git', ['commit', '-m', 'fix bug', ''])).toBe('git commit -m "fix bug" ""');
    });

    it('leaves plain arguments alone', () => {
        expect(formatCommand('gh', ['repo', 'list', '--limit', '10'])).toBe('gh repo list --limit 10');
    });
});
