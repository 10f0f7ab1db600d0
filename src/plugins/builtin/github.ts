import path from 'node:path';
import { z } from 'zod';
import { fail, ok, toCommandResult } from '../../commands/result.js';
import type { CommandMap, CommandOptions, CommandResult } from '../../commands/types.js';
import { parseJsonOutput } from '../../process/json.js';
import { isDirectory } from '../../utils/fs.js';
import { BuiltinPlugin } from './base.js';

const VERSION_CHECK_TIMEOUT_SECONDS = 10;
const NETWORK_TIMEOUT_SECONDS = 60;
const INTERACTIVE_TIMEOUT_SECONDS = 120;

const GIT_INSTALL = {
    windows: 'Download from https://git-scm.com/download/win',
    mac: 'brew install git',
    linux: 'sudo apt install git',
};

const GH_INSTALL = {
    windows: 'winget install --id GitHub.cli',
    mac: 'brew install gh',
    linux: 'See https://github.com/cli/cli/blob/trunk/docs/install_linux.md',
};

const GitHubUserSchema = z.object({
    login: z.string(),
    name: z.string().nullable().optional(),
    email: z.string().nullable().optional(),
    public_repos: z.number().optional(),
    followers: z.number().optional(),
    following: z.number().optional(),
    created_at: z.string().optional(),
    location: z.string().nullable().optional(),
    bio: z.string().nullable().optional(),
});

const RepoListSchema = z.array(z.object({
    name: z.string(),
    description: z.string().nullable().optional(),
    visibility: z.string(),
    updatedAt: z.string().optional(),
}));

const RepoViewSchema = z.object({
    name: z.string(),
    description: z.string().nullable().optional(),
    visibility: z.string().optional(),
    stargazerCount: z.number().optional(),
    forkCount: z.number().optional(),
    primaryLanguage: z.object({ name: z.string() }).nullable().optional(),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    url: z.string().optional(),
});

const REPO_LIST_FIELDS = 'name,description,visibility,updatedAt';
const REPO_VIEW_FIELDS = 'name,description,visibility,stargazerCount,forkCount,primaryLanguage,createdAt,updatedAt,url';

export interface GitHubSetupReport {
    gitInstalled: boolean;
    ghCliInstalled: boolean;
    gitConfigured: boolean;
    ghAuthenticated: boolean;
    status: 'ready' | 'partial' | 'needs_setup';
    gitUser?: { name?: string; email?: string };
    githubUser?: { login: string; name: string | null; email: string | null };
    message?: string;
    installInstructions?: Record<string, string>;
}

/**
 * GitHub — git and GitHub CLI (`gh`) workflows
 */
export class GitHubPlugin extends BuiltinPlugin {
    readonly name = 'github';
    readonly version = '1.0.0';
    readonly description = 'GitHub integration and repository management';

    private gitInstalled = false;
    private ghInstalled = false;

    protected async setup(): Promise<boolean> {
        this.gitInstalled = (await this.run('git', ['--version'], VERSION_CHECK_TIMEOUT_SECONDS)).success;
        this.ghInstalled = (await this.run('gh', ['--version'], VERSION_CHECK_TIMEOUT_SECONDS)).success;
        this.context.logger.debug('GitHub tooling detected', { git: this.gitInstalled, gh: this.ghInstalled });
        return true;
    }

    commands(): CommandMap {
        return {
            'check-setup': () => this.checkSetup(),
            'setup-git': (args) => this.setupGit(args[0], args[1]),
            'install-gh-cli': () => this.installGhCli(),
            'auth-login': () => this.authLogin(),
            'whoami': () => this.whoami(),
            'create-repo': (args, options) => this.createRepo(args[0], args.slice(1).join(' '), options),
            'clone-repo': (args) => this.cloneRepo(args[0], args[1]),
            'init-repo': (args) => this.initRepo(args[0]),
            'status': () => this.status(),
            'commit': (args) => this.commit(args.join(' ')),
            'push': (args) => this.sync('push', args[0], args[1]),
            'pull': (args) => this.sync('pull', args[0], args[1]),
            'list-repos': (args) => this.listRepos(args[0]),
            'repo-info': (args) => this.repoInfo(args[0]),
        };
    }

    async checkSetup(): Promise<CommandResult> {
        return ok(this.label('check-setup'), await this.inspect());
    }

    async setupGit(name?: string, email?: string): Promise<CommandResult> {
        const command = this.label('setup-git');
        if (!this.gitInstalled) return this.notInstalled('git', 'setup-git');
        if (!name || !email) {
            return fail(command, 'Name and email are required', {
                suggestions: ['Usage: github:setup-git "<name>" <email>'],
            });
        }

        const nameResult = await this.run('git', ['config', '--global', 'user.name', name]);
        if (!nameResult.success) {
            return fail(nameResult.command, `Failed to set name: ${nameResult.error}`, { code: nameResult.code });
        }
        const emailResult = await this.run('git', ['config', '--global', 'user.email', email]);
        if (!emailResult.success) {
            return fail(emailResult.command, `Failed to set email: ${emailResult.error}`, { code: emailResult.code });
        }

        const extras: [string[], string][] = [
            [['config', '--global', 'init.defaultBranch', 'main'], 'Default branch'],
            [['config', '--global', 'pull.rebase', 'false'], 'Merge strategy'],
            [['config', '--global', 'core.autocrlf', process.platform === 'win32' ? 'true' : 'input'], 'Line endings'],
        ];
        const additionalConfigs: { description: string; success: boolean }[] = [];
        for (const [args, description] of extras) {
            const result = await this.run('git', args);
            additionalConfigs.push({ description, success: result.success });
        }

        return ok(command, {
            message: `Git configured for ${name} <${email}>`,
            user: { name, email },
            additionalConfigs,
            nextSteps: this.ghInstalled ? ['Authenticate: github:auth-login'] : ['Install the GitHub CLI: github:install-gh-cli'],
        });
    }

    async installGhCli(): Promise<CommandResult> {
        const command = this.label('install-gh-cli');
        if (this.ghInstalled) {
            return ok(command, { message: 'GitHub CLI already installed' });
        }
        return ok(command, {
            message: 'GitHub CLI is not installed; install it with your package manager',
            instructions: GH_INSTALL,
            manualInstall: 'https://cli.github.com/',
            nextSteps: ['Restart the terminal after installation', 'Authenticate: github:auth-login'],
        });
    }

    async authLogin(): Promise<CommandResult> {
        if (!this.ghInstalled) return this.notInstalled('gh', 'auth-login');

        this.context.logger.info('Opening a browser for GitHub authentication');
        const result = await this.run('gh', ['auth', 'login', '--web'], INTERACTIVE_TIMEOUT_SECONDS);
        if (!result.success) {
            return toCommandResult(result, null, [
                'Check your internet connection',
                'Make sure your browser allows pop-ups',
                'Try: gh auth login --web',
            ]);
        }
        return ok(result.command, {
            message: 'Authenticated with GitHub',
            nextSteps: ['Check the account: github:whoami', 'Create a repository: github:create-repo REPO_NAME'],
        });
    }

    async whoami(): Promise<CommandResult> {
        if (!this.ghInstalled) return this.notInstalled('gh', 'whoami');

        const result = await this.run('gh', ['api', 'user']);
        if (!result.success) {
            return toCommandResult(result, null, ['Authenticate first: github:auth-login']);
        }
        const parsed = parseJsonOutput(result.stdout, GitHubUserSchema, 'gh api user');
        if (!parsed.ok) {
            return fail(result.command, parsed.error.message, { code: parsed.error.code });
        }

        const user = parsed.value;
        return ok(result.command, {
            user: {
                login: user.login,
                name: user.name ?? null,
                email: user.email ?? null,
                publicRepos: user.public_repos ?? null,
                followers: user.followers ?? null,
                following: user.following ?? null,
                createdAt: user.created_at ?? null,
                location: user.location ?? null,
                bio: user.bio ?? null,
            },
        });
    }

    async createRepo(repoName?: string, description = '', options: CommandOptions = {}): Promise<CommandResult> {
        if (!this.ghInstalled) return this.notInstalled('gh', 'create-repo');
        if (!repoName) {
            return fail(this.label('create-repo'), 'Repository name is required', {
                suggestions: ['Usage: github:create-repo <name> [description] [--private]'],
            });
        }

        const isPrivate = options.private === true || options.private === 'true';
        const args = ['repo', 'create', repoName];
        if (description) args.push('--description', description);
        args.push(isPrivate ? '--private' : '--public');

        const result = await this.run('gh', args, NETWORK_TIMEOUT_SECONDS);
        if (!result.success) {
            return toCommandResult(result, null, [
                'Check that the repository name is available',
                'Make sure you may create repositories on this account',
            ]);
        }
        return ok(result.command, {
            message: `Repository created: ${repoName}`,
            repository: repoName,
            visibility: isPrivate ? 'private' : 'public',
            url: result.stdout || null,
            nextSteps: [`Clone it: github:clone-repo ${result.stdout || repoName}`],
        });
    }

    async cloneRepo(repoUrl?: string, directory?: string): Promise<CommandResult> {
        if (!this.gitInstalled) return this.notInstalled('git', 'clone-repo');
        if (!repoUrl) {
            return fail(this.label('clone-repo'), 'Repository URL is required', {
                suggestions: ['Usage: github:clone-repo <url> [directory]'],
            });
        }

        const args = ['clone', repoUrl];
        if (directory) args.push(directory);

        const result = await this.run('git', args, INTERACTIVE_TIMEOUT_SECONDS);
        if (!result.success) {
            return toCommandResult(result, null, [
                'Check that the repository URL is correct',
                'Make sure you have access to the repository',
            ]);
        }

        const repoName = repoNameFromUrl(repoUrl);
        const targetDir = directory || repoName;
        return ok(result.command, {
            message: `Repository cloned: ${repoName}`,
            directory: targetDir,
            repository: repoUrl,
            nextSteps: [`cd ${targetDir}`],
        });
    }

    async initRepo(directory = '.'): Promise<CommandResult> {
        const command = this.label('init-repo');
        if (!this.gitInstalled) return this.notInstalled('git', 'init-repo');

        const repoDir = this.resolvePath(directory);
        if (!(await isDirectory(repoDir))) {
            return fail(command, `Directory not found: ${directory}`);
        }

        const init = await this.run('git', ['init'], undefined, repoDir);
        if (!init.success) {
            return fail(init.command, `Failed to initialize repository: ${init.error}`, { code: init.code });
        }

        const steps: [string[], string][] = [
            [['add', '.'], 'Stage files'],
            [['commit', '-m', 'Initial commit'], 'Initial commit'],
        ];
        const operations: { description: string; success: boolean; error: string | null }[] = [];
        for (const [args, description] of steps) {
            const result = await this.run('git', args, undefined, repoDir);
            operations.push({ description, success: result.success, error: result.error });
        }

        return ok(command, {
            message: `Git repository initialized in ${directory}`,
            directory: repoDir,
            operations,
            nextSteps: ['Create a GitHub repository: github:create-repo REPO_NAME', 'Connect it: git remote add origin URL'],
        });
    }

    async status(): Promise<CommandResult> {
        const report = await this.inspect();
        if (!this.gitInstalled) {
            return ok(this.label('status'), report);
        }

        const porcelain = await this.run('git', ['status', '--porcelain']);
        if (!porcelain.success) {
            return ok(this.label('status'), { ...report, currentRepo: { isGitRepo: false } });
        }

        const changes = porcelain.stdout ? porcelain.stdout.split('\n') : [];
        const currentRepo: Record<string, unknown> = {
            isGitRepo: true,
            hasChanges: changes.length > 0,
            changesCount: changes.length,
        };

        const branch = await this.run('git', ['branch', '--show-current']);
        if (branch.success) currentRepo.branch = branch.stdout;

        const remotes = await this.run('git', ['remote', '-v']);
        if (remotes.success && remotes.stdout) {
            currentRepo.remotes = parseRemotes(remotes.stdout);
        }

        return ok(this.label('status'), { ...report, currentRepo });
    }

    async commit(message: string): Promise<CommandResult> {
        const command = this.label('commit');
        if (!this.gitInstalled) return this.notInstalled('git', 'commit');
        if (!message) {
            return fail(command, 'Commit message is required', {
                suggestions: ['Usage: github:commit <message>'],
            });
        }

        const status = await this.run('git', ['status', '--porcelain']);
        if (!status.success) {
            return fail(status.command, `Failed to check repository status: ${status.error}`, { code: status.code });
        }
        if (!status.stdout) {
            return ok(command, { message: 'No changes to commit', status: 'clean' });
        }

        const add = await this.run('git', ['add', '.']);
        if (!add.success) {
            return fail(add.command, `Failed to stage changes: ${add.error}`, { code: add.code });
        }

        const result = await this.run('git', ['commit', '-m', message]);
        if (!result.success) {
            return fail(result.command, `Failed to commit: ${result.error}`, { code: result.code });
        }
        return ok(result.command, {
            message: `Changes committed: ${message}`,
            commitMessage: message,
            nextSteps: ['Push the changes: github:push'],
        });
    }

    /**
     * push or pull against a remote; the branch defaults to the current one
     */
    async sync(direction: 'push' | 'pull', remote = 'origin', branch?: string): Promise<CommandResult> {
        if (!this.gitInstalled) return this.notInstalled('git', direction);

        let target = branch;
        if (!target) {
            const current = await this.run('git', ['branch', '--show-current']);
            target = current.success && current.stdout ? current.stdout : 'main';
        }

        const result = await this.run('git', [direction, remote, target], NETWORK_TIMEOUT_SECONDS);
        if (!result.success) {
            return toCommandResult(result, null, direction === 'push'
                ? [
                    'Check that the remote repository exists',
                    'Make sure you have push permission',
                    `Try: git push --set-upstream ${remote} ${target}`,
                ]
                : [
                    'Check that the remote repository exists',
                    'Resolve any merge conflicts',
                ]);
        }

        const preposition = direction === 'push' ? 'to' : 'from';
        return ok(result.command, {
            message: `Changes ${direction}ed ${preposition} ${remote}/${target}`,
            remote,
            branch: target,
            ...(direction === 'pull' ? { details: result.stdout } : {}),
        });
    }

    async listRepos(limitArg = '10'): Promise<CommandResult> {
        if (!this.ghInstalled) return this.notInstalled('gh', 'list-repos');

        const limit = Number(limitArg);
        if (!Number.isInteger(limit) || limit < 1) {
            return fail(this.label('list-repos'), `Limit must be a positive integer, got "${limitArg}"`);
        }

        const result = await this.run('gh', ['repo', 'list', '--limit', String(limit), '--json', REPO_LIST_FIELDS]);
        if (!result.success) {
            return toCommandResult(result, null, ['Authenticate first: github:auth-login']);
        }
        const parsed = parseJsonOutput(result.stdout, RepoListSchema, 'gh repo list');
        if (!parsed.ok) {
            return fail(result.command, parsed.error.message, { code: parsed.error.code });
        }

        const repos = parsed.value;
        return ok(result.command, {
            repositories: repos,
            count: repos.length,
            formatted: repos.map(r => `${r.name} (${r.visibility}) - ${r.description || 'No description'}`),
        });
    }

    async repoInfo(repo?: string): Promise<CommandResult> {
        if (!this.ghInstalled) return this.notInstalled('gh', 'repo-info');

        const args = ['repo', 'view'];
        if (repo) args.push(repo);
        args.push('--json', REPO_VIEW_FIELDS);

        const result = await this.run('gh', args);
        if (!result.success) {
            return toCommandResult(result, null, ['Check the repository name and your access to it']);
        }
        const parsed = parseJsonOutput(result.stdout, RepoViewSchema, 'gh repo view');
        if (!parsed.ok) {
            return fail(result.command, parsed.error.message, { code: parsed.error.code });
        }

        const info = parsed.value;
        return ok(result.command, {
            repository: info,
            summary: {
                name: info.name,
                description: info.description ?? null,
                visibility: info.visibility ?? null,
                language: info.primaryLanguage?.name ?? null,
                stars: info.stargazerCount ?? 0,
                forks: info.forkCount ?? 0,
                created: info.createdAt ?? null,
                updated: info.updatedAt ?? null,
            },
        });
    }

    private async inspect(): Promise<GitHubSetupReport> {
        const report: GitHubSetupReport = {
            gitInstalled: this.gitInstalled,
            ghCliInstalled: this.ghInstalled,
            gitConfigured: false,
            ghAuthenticated: false,
            status: 'needs_setup',
        };

        if (!this.gitInstalled) {
            report.message = 'Git not installed';
            report.installInstructions = GIT_INSTALL;
            return report;
        }

        const config = await this.run('git', ['config', '--global', '--list']);
        if (config.success) {
            const gitUser = parseGitUser(config.stdout);
            report.gitConfigured = Boolean(gitUser.name && gitUser.email);
            if (report.gitConfigured) report.gitUser = gitUser;
        }

        if (this.ghInstalled) {
            report.ghAuthenticated = (await this.run('gh', ['auth', 'status'])).success;
            if (report.ghAuthenticated) {
                const user = await this.run('gh', ['api', 'user']);
                if (user.success) {
                    const parsed = parseJsonOutput(user.stdout, GitHubUserSchema, 'gh api user');
                    if (parsed.ok) {
                        report.githubUser = {
                            login: parsed.value.login,
                            name: parsed.value.name ?? null,
                            email: parsed.value.email ?? null,
                        };
                    } else {
                        this.context.logger.warn(parsed.error.message);
                    }
                }
            }
        }

        if (report.gitConfigured && report.ghCliInstalled && report.ghAuthenticated) {
            report.status = 'ready';
        } else if (report.gitConfigured) {
            report.status = 'partial';
        }
        return report;
    }

    private notInstalled(tool: 'git' | 'gh', command: string): CommandResult {
        return tool === 'git'
            ? fail(this.label(command), 'Git not installed', {
                code: 'TOOL_NOT_INSTALLED',
                suggestions: Object.values(GIT_INSTALL),
            })
            : fail(this.label(command), 'GitHub CLI not installed', {
                code: 'TOOL_NOT_INSTALLED',
                suggestions: ['See: github:install-gh-cli'],
            });
    }
}

/**
 * user.name / user.email from `git config --list` output
 */
export function parseGitUser(configList: string): { name?: string; email?: string } {
    const user: { name?: string; email?: string } = {};
    for (const line of configList.split('\n')) {
        const separator = line.indexOf('=');
        if (separator < 0) continue;
        const key = line.slice(0, separator).trim();
        const value = line.slice(separator + 1);
        if (key === 'user.name') user.name = value;
        else if (key === 'user.email') user.email = value;
    }
    return user;
}

/**
 * First URL per remote name from `git remote -v`
 */
export function parseRemotes(output: string): Record<string, string> {
    const remotes: Record<string, string> = {};
    for (const line of output.split('\n')) {
        const [name, url] = line.trim().split(/\s+/);
        if (name && url && !Object.hasOwn(remotes, name)) {
            remotes[name] = url;
        }
    }
    return remotes;
}

export function repoNameFromUrl(url: string): string {
    const last = url.replace(/\/+$/, '').split(/[/:]/).pop() ?? url;
    return path.basename(last, '.git');
}
