import { describe, it, expect, beforeEach } from 'vitest';
import { ok } from '../../src/commands/result.js';
import { CommandRouter, parseCommand, splitArguments, tokenize } from '../../src/commands/router.js';
import { PluginRegistry } from '../../src/plugins/registry.js';
import { TaskTracker } from '../../src/tasks/tracker.js';
import { MemoryTaskStore } from '../../src/tasks/store.js';
import type { LogEntry } from '../../src/logging/logger.js';
import { captureLogger, pluginContext } from '../fixtures/context.js';
import { ScriptedInvoker } from '../fixtures/invoker.js';
import { fakePlugin } from '../fixtures/plugins.js';

describe('tokenize', () => {
    it('splits on whitespace and groups quoted text', () => {
        expect(tokenize('github:commit "fix the bug"   --push')).toEqual(['github:commit', 'fix the bug', '--push']);
    });

    it('honours single quotes and escapes inside double quotes', () => {
        expect(tokenize(`say 'a b' "c \\"d\\""`)).toEqual(['say', 'a b', 'c "d"']);
    });

    it('keeps an empty quoted argument', () => {
        expect(tokenize(`x ''`)).toEqual(['x', '']);
    });

    it('returns nothing for blank input', () => {
        expect(tokenize('   ')).toEqual([]);
    });
});

describe('parseCommand', () => {
    it('splits on the first colon only', () => {
        expect(parseCommand('demo:a:b')).toEqual({ namespace: 'demo', command: 'a:b' });
    });

    it('returns null without a colon', () => {
        expect(parseCommand('explain')).toBeNull();
    });
});

describe('splitArguments', () => {
    it('separates flags and key=value options from positionals', () => {
        expect(splitArguments(['app', '--force', '--region=us-east1', 'extra'])).toEqual({
            args: ['app', 'extra'],
            options: { force: true, region: 'us-east1' },
        });
    });

    it('stops parsing options after a bare --', () => {
        expect(splitArguments(['--dry', '--', '--literal', '-x'])).toEqual({
            args: ['--literal', '-x'],
            options: { dry: true },
        });
    });

    it('keeps tokens that are not options as positionals', () => {
        expect(splitArguments(['-x', '--', '--=v'])).toEqual({ args: ['-x', '--=v'], options: {} });
        expect(splitArguments(['--=v'])).toEqual({ args: ['--=v'], options: {} });
    });
});

describe('CommandRouter', () => {
    let invoker: ScriptedInvoker;
    let tracker: TaskTracker;
    let registry: PluginRegistry;
    let entries: LogEntry[];
    let router: CommandRouter;

    beforeEach(async () => {
        invoker = new ScriptedInvoker();
        tracker = new TaskTracker();
        const captured = captureLogger();
        entries = captured.entries;

        registry = new PluginRegistry({ context: pluginContext({ invoker, logger: captured.logger }), builtins: [] });
        await registry.register(fakePlugin('demo', {
            echo: (args, options) => ok('demo:echo', { args, options }),
            broken: () => ({ error: 'demo failure' }),
        }));
        registry.seal();

        router = new CommandRouter({
            registry,
            invoker,
            tracker,
            logger: captured.logger,
            primaryTool: 'claude',
            primaryTimeoutSeconds: 300,
            cwd: '/work',
        });
    });

    it('dispatches plugin commands with parsed options', async () => {
        const result = await router.route('demo:echo', ['x', '--loud', '--level=3']);

        expect(result).toEqual(ok('demo:echo', { args: ['x'], options: { loud: true, level: '3' } }));
        expect(invoker.calls).toEqual([]);
    });

    it('tokenizes a raw line before routing', async () => {
        const result = await router.execute('demo:echo "two words"');

        expect(result.output).toEqual({ args: ['two words'], options: {} });
    });

    it('rejects an empty line', async () => {
        expect(await router.execute('  ')).toEqual({ success: false, output: null, error: 'Empty command', command: '' });
    });

    it('expands shortcuts for the primary tool', async () => {
        invoker.on('claude', ['/build'], { stdout: 'built' });

        const result = await router.route('/sc:build', ['src']);

        expect(result.success).toBe(true);
        expect(result.output).toBe('built');
        expect(invoker.calls).toEqual([
            { executable: 'claude', args: ['/build', 'src'], options: { timeoutSeconds: 300, cwd: '/work' } },
        ]);
    });

    it('rejects unknown shortcuts, including prototype keys', async () => {
        const unknown = await router.route('/sc:deploy');
        const proto = await router.route('/sc:constructor');

        expect(unknown.error).toBe('Unknown shortcut command: deploy');
        expect(proto.error).toBe('Unknown shortcut command: constructor');
        expect(invoker.calls).toEqual([]);
    });

    it('forwards everything else to the primary tool', async () => {
        invoker.on('claude', ['explain'], { stdout: 'explained' });

        const result = await router.route('explain', ['this', 'file']);

        expect(result.output).toBe('explained');
        expect(invoker.argsOf('claude')).toEqual([['explain', 'this', 'file']]);
    });

    it('suggests installing a missing primary tool', async () => {
        invoker.missing('claude');

        const result = await router.route('explain');

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.code).toBe('TOOL_NOT_INSTALLED');
        expect(result.suggestions).toEqual(['Install claude or set assistant.primaryTool in the configuration']);
    });

    it('reports a missing plugin system', async () => {
        const bare = new CommandRouter({
            registry: null,
            invoker,
            tracker,
            logger: captureLogger().logger,
            primaryTool: 'claude',
            primaryTimeoutSeconds: 300,
            cwd: '/work',
        });

        const result = await bare.route('demo:echo');

        expect(result.error).toBe('Plugin system is not available');
    });

    it('records a completed task for a successful command', async () => {
        await router.route('demo:echo', ['x', '--loud']);

        const [task] = tracker.list();
        expect(tracker.list()).toHaveLength(1);
        expect(task?.description).toBe('Execute: demo:echo');
        expect(task?.status).toBe('completed');
        expect(task?.context).toEqual({ args: ['x', '--loud'] });
    });

    it('records a failed task with the error', async () => {
        await router.route('demo:broken');

        const [task] = tracker.list();
        expect(task?.status).toBe('failed');
        expect(task?.error).toBe('demo failure');
    });

    it('keeps the result when task tracking breaks', async () => {
        class FullStore extends MemoryTaskStore {
            insert(): void {
                throw new Error('disk full');
            }
        }
        const broken = new CommandRouter({
            registry,
            invoker,
            tracker: new TaskTracker({ store: new FullStore() }),
            logger: captureLogger().logger,
            primaryTool: 'claude',
            primaryTimeoutSeconds: 300,
            cwd: '/work',
        });

        const result = await broken.route('demo:echo', ['x']);

        expect(result.success).toBe(true);
        expect(result.output).toEqual({ args: ['x'], options: {} });
    });

    it('logs a tracking failure as a warning', async () => {
        class FullStore extends MemoryTaskStore {
            insert(): void {
                throw new Error('disk full');
            }
        }
        const captured = captureLogger();
        const broken = new CommandRouter({
            registry,
            invoker,
            tracker: new TaskTracker({ store: new FullStore() }),
            logger: captured.logger,
            primaryTool: 'claude',
            primaryTimeoutSeconds: 300,
            cwd: '/work',
        });

        await broken.route('demo:echo');

        const warnings = captured.entries.filter(e => e.level === 'warn').map(e => e.message);
        expect(warnings).toEqual(['Task tracking failed at create: disk full']);
        expect(entries.filter(e => e.level === 'warn')).toEqual([]);
    });
});
