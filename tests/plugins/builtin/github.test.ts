import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { basename, join } from 'node:path';
import { GitHubPlugin, parseGitUser, parseRemotes, repoNameFromUrl } from '../../../src/plugins/builtin/github.js';
import { makeTempDir, pluginContext, removeDir } from '../../fixtures/context.js';
import { ScriptedInvoker } from '../../fixtures/invoker.js';

const REPO_VIEW_FIELDS = 'name,description,visibility,stargazerCount,forkCount,primaryLanguage,createdAt,updatedAt,url';

describe('GitHubPlugin', () => {
    let dir: string;
    let invoker: ScriptedInvoker;

    beforeEach(async () => {
        dir = await makeTempDir();
        invoker = new ScriptedInvoker();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    async function start(): Promise<GitHubPlugin> {
        const plugin = new GitHubPlugin();
        await plugin.initialize(pluginContext({ cwd: dir, invoker }));
        return plugin;
    }

    describe('without git or gh', () => {
        beforeEach(() => {
            invoker.missing('git').missing('gh');
        });

        it('reports what to install', async () => {
            const plugin = await start();

            const result = await plugin.checkSetup();

            expect(result.output).toEqual({
                gitInstalled: false,
                ghCliInstalled: false,
                gitConfigured: false,
                ghAuthenticated: false,
                status: 'needs_setup',
                message: 'Git not installed',
                installInstructions: {
                    windows: 'Download from https://git-scm.com/download/win',
                    mac: 'brew install git',
                    linux: 'sudo apt install git',
                },
            });
        });

        it('fails git and gh commands as not installed', async () => {
            const plugin = await start();

            const commit = await plugin.commit('wip');
            const whoami = await plugin.whoami();

            expect(commit).toMatchObject({ success: false, error: 'Git not installed', code: 'TOOL_NOT_INSTALLED' });
            expect(whoami).toEqual({
                success: false,
                output: null,
                error: 'GitHub CLI not installed',
                command: 'github:whoami',
                code: 'TOOL_NOT_INSTALLED',
                suggestions: ['See: github:install-gh-cli'],
            });
        });

        it('gives installation instructions without installing anything', async () => {
            const plugin = await start();

            const result = await plugin.installGhCli();

            expect(result.success).toBe(true);
            expect(result.output).toMatchObject({ manualInstall: 'https://cli.github.com/' });
            expect(invoker.calls.map(c => c.args)).toEqual([['--version'], ['--version']]);
        });
    });

    describe('with git and gh', () => {
        beforeEach(() => {
            invoker.on('git', ['--version'], { stdout: 'git version 2.45.0' }).on('gh', ['--version']);
        });

        it('is ready when git is configured and gh is authenticated', async () => {
            invoker
                .on('git', ['config', '--global', '--list'], { stdout: 'user.name=Dev Example\nuser.email=dev@example.com\ncore.editor=vim' })
                .on('gh', ['auth', 'status'])
                .on('gh', ['api', 'user'], { stdout: JSON.stringify({ login: 'devexample', name: 'Dev Example', email: null }) });
            const plugin = await start();

            const result = await plugin.checkSetup();

            expect(result.output).toEqual({
                gitInstalled: true,
                ghCliInstalled: true,
                gitConfigured: true,
                ghAuthenticated: true,
                status: 'ready',
                gitUser: { name: 'Dev Example', email: 'dev@example.com' },
                githubUser: { login: 'devexample', name: 'Dev Example', email: null },
            });
        });

        it('is partial when gh is not authenticated', async () => {
            invoker
                .on('git', ['config', '--global', '--list'], { stdout: 'user.name=Dev Example\nuser.email=dev@example.com' })
                .on('gh', ['auth', 'status'], { error: 'You are not logged into any GitHub hosts' });
            const plugin = await start();

            const result = await plugin.checkSetup();

            expect(result.output).toMatchObject({ gitConfigured: true, ghAuthenticated: false, status: 'partial' });
        });

        it('configures git identity and defaults', async () => {
            invoker.on('git', ['config', '--global']);
            const plugin = await start();

            const result = await plugin.setupGit('Dev Example', 'dev@example.com');

            expect(result.output).toEqual({
                message: 'Git configured for Dev Example <dev@example.com>',
                user: { name: 'Dev Example', email: 'dev@example.com' },
                additionalConfigs: [
                    { description: 'Default branch', success: true },
                    { description: 'Merge strategy', success: true },
                    { description: 'Line endings', success: true },
                ],
                nextSteps: ['Authenticate: github:auth-login'],
            });
            expect(invoker.argsOf('git').slice(1)).toEqual([
                ['config', '--global', 'user.name', 'Dev Example'],
                ['config', '--global', 'user.email', 'dev@example.com'],
                ['config', '--global', 'init.defaultBranch', 'main'],
                ['config', '--global', 'pull.rebase', 'false'],
                ['config', '--global', 'core.autocrlf', process.platform === 'win32' ? 'true' : 'input'],
            ]);
        });

        it('needs both name and email', async () => {
            const plugin = await start();

            expect((await plugin.setupGit('Dev Example')).error).toBe('Name and email are required');
        });

        it('creates a private repository with a description', async () => {
            invoker.on('gh', ['repo', 'create'], { stdout: 'https://github.com/devexample/demo' });
            const plugin = await start();

            const result = await plugin.commands()['create-repo']?.(['demo', 'A', 'demo', 'repo'], { private: true });

            expect(result?.output).toEqual({
                message: 'Repository created: demo',
                repository: 'demo',
                visibility: 'private',
                url: 'https://github.com/devexample/demo',
                nextSteps: ['Clone it: github:clone-repo https://github.com/devexample/demo'],
            });
            expect(invoker.calls.at(-1)).toEqual({
                executable: 'gh',
                args: ['repo', 'create', 'demo', '--description', 'A demo repo', '--private'],
                options: { cwd: dir, timeoutSeconds: 60 },
            });
        });

        it('creates public repositories by default', async () => {
            invoker.on('gh', ['repo', 'create']);
            const plugin = await start();

            await plugin.createRepo('demo');

            expect(invoker.calls.at(-1)?.args).toEqual(['repo', 'create', 'demo', '--public']);
        });

        it('clones into a directory named after the repository', async () => {
            invoker.on('git', ['clone']);
            const plugin = await start();

            const result = await plugin.cloneRepo('https://github.com/devexample/demo.git');

            expect(result.output).toMatchObject({ directory: 'demo', message: 'Repository cloned: demo' });
        });

        it('initializes a repository inside the target directory', async () => {
            invoker.on('git', ['init']).on('git', ['add']).on('git', ['commit']);
            const plugin = await start();

            const result = await plugin.initRepo();

            expect(result.output).toMatchObject({
                directory: dir,
                operations: [
                    { description: 'Stage files', success: true, error: null },
                    { description: 'Initial commit', success: true, error: null },
                ],
            });
            expect(invoker.calls.slice(2).map(c => [c.args[0], c.options.cwd])).toEqual([
                ['init', dir],
                ['add', dir],
                ['commit', dir],
            ]);
        });

        it('refuses to initialize a missing directory', async () => {
            const plugin = await start();

            expect((await plugin.initRepo('nope')).error).toBe('Directory not found: nope');
        });

        it('summarizes the working tree in status', async () => {
            invoker
                .on('git', ['status', '--porcelain'], { stdout: 'M a.ts\n?? b.ts' })
                .on('git', ['branch', '--show-current'], { stdout: 'main' })
                .on('git', ['remote', '-v'], {
                    stdout: 'origin\thttps://github.com/devexample/demo.git (fetch)\norigin\thttps://github.com/devexample/demo.git (push)',
                });
            const plugin = await start();

            const result = await plugin.status();

            expect(result.output).toMatchObject({
                status: 'needs_setup',
                currentRepo: {
                    isGitRepo: true,
                    hasChanges: true,
                    changesCount: 2,
                    branch: 'main',
                    remotes: { origin: 'https://github.com/devexample/demo.git' },
                },
            });
        });

        it('has nothing to commit in a clean tree', async () => {
            invoker.on('git', ['status', '--porcelain'], { stdout: '' });
            const plugin = await start();

            const result = await plugin.commit('wip');

            expect(result.output).toEqual({ message: 'No changes to commit', status: 'clean' });
            expect(invoker.argsOf('git').map(a => a[0])).toEqual(['--version', 'status']);
        });

        it('stages and commits with the joined message', async () => {
            invoker
                .on('git', ['status', '--porcelain'], { stdout: 'M a.ts' })
                .on('git', ['add'])
                .on('git', ['commit']);
            const plugin = await start();

            const result = await plugin.commands().commit?.(['fix', 'the', 'bug'], {});

            expect(result?.output).toMatchObject({ commitMessage: 'fix the bug' });
            expect(invoker.calls.at(-1)?.args).toEqual(['commit', '-m', 'fix the bug']);
        });

        it('requires a commit message', async () => {
            const plugin = await start();

            expect((await plugin.commit('')).error).toBe('Commit message is required');
        });

        it('pushes the current branch by default', async () => {
            invoker
                .on('git', ['branch', '--show-current'], { stdout: 'feature/x' })
                .on('git', ['push']);
            const plugin = await start();

            const result = await plugin.sync('push');

            expect(result.output).toEqual({ message: 'Changes pushed to origin/feature/x', remote: 'origin', branch: 'feature/x' });
            expect(invoker.calls.at(-1)).toEqual({
                executable: 'git',
                args: ['push', 'origin', 'feature/x'],
                options: { cwd: dir, timeoutSeconds: 60 },
            });
        });

        it('suggests setting an upstream when a push fails', async () => {
            invoker
                .on('git', ['branch', '--show-current'], { stdout: 'feature/x' })
                .on('git', ['push'], { error: 'fatal: The current branch has no upstream branch.', exitCode: 128 });
            const plugin = await start();

            const result = await plugin.sync('push');

            expect(result.error).toBe('fatal: The current branch has no upstream branch.');
            expect(result.suggestions).toContain('Try: git push --set-upstream origin feature/x');
        });

        it('pulls from an explicit remote and branch', async () => {
            invoker.on('git', ['pull'], { stdout: 'Already up to date.' });
            const plugin = await start();

            const result = await plugin.commands().pull?.(['upstream', 'main'], {});

            expect(result?.output).toEqual({
                message: 'Changes pulled from upstream/main',
                remote: 'upstream',
                branch: 'main',
                details: 'Already up to date.',
            });
            expect(invoker.argsOf('git').map(a => a[0])).toEqual(['--version', 'pull']);
        });

        it('validates the list limit', async () => {
            const plugin = await start();

            expect((await plugin.listRepos('ten')).error).toBe('Limit must be a positive integer, got "ten"');
        });

        it('lists repositories', async () => {
            invoker.on('gh', ['repo', 'list'], {
                stdout: JSON.stringify([
                    { name: 'demo', description: 'A demo repo', visibility: 'PUBLIC', updatedAt: '2024-02-01T00:00:00Z' },
                    { name: 'secret', description: null, visibility: 'PRIVATE' },
                ]),
            });
            const plugin = await start();

            const result = await plugin.listRepos('5');

            expect(invoker.calls.at(-1)?.args).toEqual(['repo', 'list', '--limit', '5', '--json', 'name,description,visibility,updatedAt']);
            expect(result.output).toMatchObject({
                count: 2,
                formatted: ['demo (PUBLIC) - A demo repo', 'secret (PRIVATE) - No description'],
            });
        });

        it('summarizes repository details', async () => {
            invoker.on('gh', ['repo', 'view'], {
                stdout: JSON.stringify({
                    name: 'demo',
                    description: null,
                    visibility: 'PUBLIC',
                    stargazerCount: 3,
                    forkCount: 1,
                    primaryLanguage: { name: 'TypeScript' },
                    createdAt: '2024-01-01T00:00:00Z',
                    updatedAt: '2024-02-01T00:00:00Z',
                    url: 'https://github.com/devexample/demo',
                }),
            });
            const plugin = await start();

            const result = await plugin.repoInfo('devexample/demo');

            expect(invoker.calls.at(-1)?.args).toEqual(['repo', 'view', 'devexample/demo', '--json', REPO_VIEW_FIELDS]);
            expect(result.output).toMatchObject({
                summary: {
                    name: 'demo',
                    description: null,
                    visibility: 'PUBLIC',
                    language: 'TypeScript',
                    stars: 3,
                    forks: 1,
                    created: '2024-01-01T00:00:00Z',
                    updated: '2024-02-01T00:00:00Z',
                },
            });
        });

        it('flags malformed user JSON', async () => {
            invoker.on('gh', ['api', 'user'], { stdout: '{"name":"no login"}' });
            const plugin = await start();

            const result = await plugin.whoami();

            expect(result).toMatchObject({ success: false, code: 'MALFORMED_OUTPUT' });
        });
    });
});

describe('git output helpers', () => {
    it('reads the user from git config --list', () => {
        expect(parseGitUser('user.name=Dev Example\nuser.email=dev@example.com\nnot a setting')).toEqual({
            name: 'Dev Example',
            email: 'dev@example.com',
        });
    });

    it('keeps the first URL of each remote', () => {
        expect(parseRemotes('origin\tgit@github.com:a/b.git (fetch)\norigin\tgit@github.com:a/b.git (push)\nfork\thttps://x/y (fetch)')).toEqual({
            origin: 'git@github.com:a/b.git',
            fork: 'https://x/y',
        });
    });

    it('keeps remotes whose names shadow object members', () => {
        expect(parseRemotes('constructor\thttps://x/a (fetch)\ntoString\thttps://x/b (fetch)')).toEqual({
            constructor: 'https://x/a',
            toString: 'https://x/b',
        });
    });

    it('derives the repository name from https and ssh URLs', () => {
        expect(repoNameFromUrl('https://github.com/devexample/demo.git')).toBe('demo');
        expect(repoNameFromUrl('git@github.com:devexample/demo.git')).toBe('demo');
        expect(repoNameFromUrl('https://github.com/devexample/demo/')).toBe('demo');
    });
});

describe('initRepo path handling', () => {
    it('resolves a relative directory against the working directory', async () => {
        const dir = await makeTempDir();
        try {
            const invoker = new ScriptedInvoker().on('git', []);
            const plugin = new GitHubPlugin();
            await plugin.initialize(pluginContext({ cwd: join(dir, '..'), invoker }));

            const result = await plugin.initRepo(basename(dir));

            expect(result.output).toMatchObject({ directory: dir });
        } finally {
            await removeDir(dir);
        }
    });
});
