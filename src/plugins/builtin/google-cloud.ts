import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { fail, ok, toCommandResult } from '../../commands/result.js';
import type { CommandFailure, CommandMap, CommandResult } from '../../commands/types.js';
import { parseJsonOutput } from '../../process/json.js';
import { pathExists } from '../../utils/fs.js';
import { BuiltinPlugin } from './base.js';

export const DEFAULT_REGION = 'asia-northeast3';

const VERSION_CHECK_TIMEOUT_SECONDS = 10;
const LOGIN_TIMEOUT_SECONDS = 120;
const CREATE_TIMEOUT_SECONDS = 60;
const APP_CREATE_TIMEOUT_SECONDS = 120;
const DEPLOY_TIMEOUT_SECONDS = 600;

const INSTALL_INSTRUCTIONS = {
    windows: 'Download and run the Google Cloud SDK installer from https://cloud.google.com/sdk/docs/install',
    mac: 'brew install --cask google-cloud-sdk',
    linux: 'Follow https://cloud.google.com/sdk/docs/install for your distribution',
};

const AuthListSchema = z.array(z.object({
    account: z.string(),
    status: z.string().optional(),
}));

const ProjectSchema = z.object({
    projectId: z.string(),
    name: z.string().optional(),
    projectNumber: z.string().optional(),
    lifecycleState: z.string().optional(),
});

const AppSchema = z.object({
    id: z.string().optional(),
    locationId: z.string().optional(),
    servingStatus: z.string().optional(),
});

export type GcloudProject = z.infer<typeof ProjectSchema>;

export interface SetupReport {
    gcloudInstalled: boolean;
    authenticated: boolean;
    currentProject: string | null;
    authAccounts: string[];
    status: 'ready' | 'needs_setup';
}

export interface GoogleCloudOptions {
    /** Cloud SDK locations tried when `gcloud` is not on PATH */
    candidatePaths?: string[];
}

/**
 * Google Cloud — project, App Engine and gcloud configuration commands
 */
export class GoogleCloudPlugin extends BuiltinPlugin {
    readonly name = 'google-cloud';
    readonly version = '1.0.0';
    readonly description = 'Google Cloud Platform integration and project management';

    /** Executable found at initialize, null when the SDK is missing */
    private gcloud: string | null = null;

    constructor(private readonly options: GoogleCloudOptions = {}) {
        super();
    }

    protected async setup(): Promise<boolean> {
        this.gcloud = await this.locate();
        if (!this.gcloud) {
            this.context.logger.debug('gcloud not found; google-cloud commands will report how to install it');
        }
        return true;
    }

    commands(): CommandMap {
        return {
            'check-setup': () => this.checkSetup(),
            'auth-login': () => this.authLogin(),
            'list-projects': () => this.listProjects(),
            'set-project': (args) => this.setProject(args[0]),
            'get-project': () => this.getProject(),
            'create-project': (args) => this.createProject(args[0], args.slice(1).join(' ')),
            'init-app-engine': (args) => this.initAppEngine(args[0]),
            'deploy': (args) => this.deploy(args[0]),
            'status': () => this.status(),
            'setup-config': (args) => this.setupConfig(args[0]),
        };
    }

    async checkSetup(): Promise<CommandResult> {
        const command = this.label('check-setup');
        if (!this.gcloud) {
            return ok(command, {
                gcloudInstalled: false,
                message: 'Google Cloud CLI not installed',
                installInstructions: INSTALL_INSTRUCTIONS,
            });
        }

        const report = await this.inspect(this.gcloud);
        return 'success' in report ? report : ok(command, report);
    }

    async authLogin(): Promise<CommandResult> {
        const gcloud = this.gcloud;
        if (!gcloud) return this.notInstalled('auth-login');

        this.context.logger.info('Opening a browser for Google Cloud authentication');
        const result = await this.run(gcloud, ['auth', 'login'], LOGIN_TIMEOUT_SECONDS);
        if (!result.success) {
            return toCommandResult(result, null, [
                'Check your internet connection',
                'Make sure your browser allows pop-ups',
                'Try: gcloud auth login --no-browser',
            ]);
        }
        return ok(result.command, {
            message: 'Authenticated with Google Cloud',
            nextSteps: ['Set a project with: google-cloud:set-project PROJECT_ID'],
        });
    }

    async listProjects(): Promise<CommandResult> {
        const gcloud = this.gcloud;
        if (!gcloud) return this.notInstalled('list-projects');

        const result = await this.run(gcloud, ['projects', 'list', '--format=json']);
        if (!result.success) {
            return toCommandResult(result, null, ['Authenticate first: google-cloud:auth-login']);
        }

        const parsed = parseJsonOutput(result.stdout, z.array(ProjectSchema), 'gcloud projects list');
        if (!parsed.ok) {
            return fail(result.command, parsed.error.message, { code: parsed.error.code });
        }

        const projects = parsed.value;
        return ok(result.command, {
            projects,
            count: projects.length,
            formatted: projects.map(p => `${p.projectId} - ${p.name ?? 'Unnamed'} (${p.lifecycleState ?? 'UNKNOWN'})`),
        });
    }

    async setProject(projectId?: string): Promise<CommandResult> {
        const gcloud = this.gcloud;
        if (!gcloud) return this.notInstalled('set-project');
        if (!projectId) {
            return fail(this.label('set-project'), 'Project ID is required', {
                suggestions: ['Usage: google-cloud:set-project <project-id>'],
            });
        }

        const result = await this.run(gcloud, ['config', 'set', 'project', projectId]);
        if (!result.success) {
            return toCommandResult(result, null, [
                'Check that the project ID is correct',
                'Verify you have access to this project',
                'List available projects with: google-cloud:list-projects',
            ]);
        }
        return ok(result.command, { message: `Project set to: ${projectId}`, projectId });
    }

    async getProject(): Promise<CommandResult> {
        const gcloud = this.gcloud;
        if (!gcloud) return this.notInstalled('get-project');

        const projectId = await this.currentProject(gcloud);
        if (!projectId) {
            return fail(this.label('get-project'), 'No project set', {
                suggestions: ['Set a project with: google-cloud:set-project PROJECT_ID'],
            });
        }

        const result = await this.run(gcloud, ['projects', 'describe', projectId, '--format=json']);
        if (result.success) {
            const parsed = parseJsonOutput(result.stdout, ProjectSchema, 'gcloud projects describe');
            if (parsed.ok) {
                return ok(result.command, {
                    projectId,
                    projectName: parsed.value.name ?? 'Unknown',
                    projectNumber: parsed.value.projectNumber ?? 'Unknown',
                    status: parsed.value.lifecycleState ?? 'Unknown',
                    details: parsed.value,
                });
            }
            this.context.logger.warn(parsed.error.message);
        }

        return ok(this.label('get-project'), { projectId, message: `Current project: ${projectId}` });
    }

    async createProject(projectId?: string, projectName?: string): Promise<CommandResult> {
        const gcloud = this.gcloud;
        if (!gcloud) return this.notInstalled('create-project');
        if (!projectId) {
            return fail(this.label('create-project'), 'Project ID is required', {
                suggestions: ['Usage: google-cloud:create-project <project-id> [name]'],
            });
        }

        const args = ['projects', 'create', projectId];
        if (projectName) args.push('--name', projectName);

        const result = await this.run(gcloud, args, CREATE_TIMEOUT_SECONDS);
        if (!result.success) {
            return toCommandResult(result, null, [
                'Project IDs must be globally unique',
                'Use only lowercase letters, digits and hyphens',
                'Project IDs are 6-30 characters long',
            ]);
        }
        return ok(result.command, {
            message: `Project created: ${projectId}`,
            projectId,
            nextSteps: [
                `Make it current: google-cloud:set-project ${projectId}`,
                'Enable the APIs your application needs',
                'Set up billing if needed',
            ],
        });
    }

    async initAppEngine(region = DEFAULT_REGION): Promise<CommandResult> {
        const gcloud = this.gcloud;
        if (!gcloud) return this.notInstalled('init-app-engine');

        const result = await this.run(gcloud, ['app', 'create', '--region', region], APP_CREATE_TIMEOUT_SECONDS);
        if (!result.success) {
            return toCommandResult(result, null, [
                'Available regions include asia-northeast3 (Seoul), asia-northeast1 (Tokyo), us-central1 (Iowa), europe-west1 (Belgium)',
            ]);
        }
        return ok(result.command, {
            message: `App Engine initialized in region: ${region}`,
            region,
            nextSteps: ['Create an app.yaml for your application', 'Deploy with: google-cloud:deploy'],
        });
    }

    async deploy(appYaml = 'app.yaml'): Promise<CommandResult> {
        const gcloud = this.gcloud;
        if (!gcloud) return this.notInstalled('deploy');

        const appYamlPath = this.resolvePath(appYaml);
        if (!(await pathExists(appYamlPath))) {
            return fail(this.label('deploy'), `app.yaml not found at: ${appYamlPath}`, {
                suggestions: ['Create app.yaml first or pass its path: google-cloud:deploy <path>'],
            });
        }

        this.context.logger.info('Deploying to Google App Engine');
        const result = await this.run(gcloud, ['app', 'deploy', appYamlPath, '--quiet'], DEPLOY_TIMEOUT_SECONDS);
        if (!result.success) {
            return toCommandResult(result, null, [
                'Check the app.yaml syntax',
                'Make sure App Engine is initialized: google-cloud:init-app-engine',
                'Verify all required files are present',
            ]);
        }
        return ok(result.command, {
            message: 'Application deployed',
            appYaml: appYamlPath,
            nextSteps: ['View your app: gcloud app browse', 'Tail logs: gcloud app logs tail -s default'],
        });
    }

    async status(): Promise<CommandResult> {
        const command = this.label('status');
        const gcloud = this.gcloud;
        if (!gcloud) return this.checkSetup();

        const report = await this.inspect(gcloud);
        if ('success' in report) return report;
        if (!report.authenticated) {
            return ok(command, report);
        }

        const project = await this.getProject();
        const app = await this.run(gcloud, ['app', 'describe', '--format=json']);
        let appEngine: Record<string, unknown> = { initialized: false };
        if (app.success) {
            const parsed = parseJsonOutput(app.stdout, AppSchema, 'gcloud app describe');
            if (parsed.ok) {
                appEngine = {
                    initialized: true,
                    id: parsed.value.id ?? null,
                    location: parsed.value.locationId ?? null,
                    servingStatus: parsed.value.servingStatus ?? null,
                };
            }
        }

        return ok(command, {
            ...report,
            projectInfo: project.success ? project.output : null,
            appEngine,
            summary: `Ready - Project: ${report.currentProject ?? 'None'}`,
        });
    }

    async setupConfig(region = DEFAULT_REGION): Promise<CommandResult> {
        const command = this.label('setup-config');
        const gcloud = this.gcloud;
        if (!gcloud) return this.notInstalled('setup-config');

        const steps: [string[], string][] = [
            [['config', 'set', 'compute/region', region], `Set region to ${region}`],
            [['config', 'set', 'compute/zone', `${region}-a`], `Set zone to ${region}-a`],
            [['config', 'set', 'core/disable_usage_reporting', 'true'], 'Disable usage reporting'],
        ];

        const results: { description: string; success: boolean; error: string | null }[] = [];
        for (const [args, description] of steps) {
            const result = await this.run(gcloud, args);
            results.push({ description, success: result.success, error: result.error });
        }

        const succeeded = results.filter(r => r.success).length;
        const output = {
            message: `Configuration setup: ${succeeded}/${steps.length} successful`,
            region,
            results,
        };
        return succeeded === steps.length
            ? ok(command, output)
            : fail(command, output.message, { output });
    }

    /**
     * Auth accounts and current project; a failure result when auth output is unreadable
     */
    private async inspect(gcloud: string): Promise<SetupReport | CommandFailure> {
        const auth = await this.run(gcloud, ['auth', 'list', '--format=json']);
        let accounts: string[] = [];
        let authenticated = false;

        if (auth.success) {
            const parsed = parseJsonOutput(auth.stdout, AuthListSchema, 'gcloud auth list');
            if (!parsed.ok) {
                return fail(auth.command, parsed.error.message, { code: parsed.error.code });
            }
            accounts = parsed.value.map(a => a.account);
            authenticated = parsed.value.some(a => a.status === 'ACTIVE');
        }

        const currentProject = await this.currentProject(gcloud);
        return {
            gcloudInstalled: true,
            authenticated,
            currentProject,
            authAccounts: accounts,
            status: authenticated && currentProject ? 'ready' : 'needs_setup',
        };
    }

    private async currentProject(gcloud: string): Promise<string | null> {
        const result = await this.run(gcloud, ['config', 'get-value', 'project']);
        if (!result.success || !result.stdout || result.stdout === '(unset)') return null;
        return result.stdout;
    }

    private notInstalled(command: string): CommandResult {
        return fail(this.label(command), 'Google Cloud CLI not installed', {
            code: 'TOOL_NOT_INSTALLED',
            suggestions: Object.values(INSTALL_INSTRUCTIONS),
        });
    }

    /**
     * `gcloud` on PATH, else the first known SDK location that answers
     */
    private async locate(): Promise<string | null> {
        const fallbacks = this.options.candidatePaths ?? defaultSdkPaths();
        const candidates = ['gcloud'];
        for (const candidate of fallbacks) {
            if (await pathExists(candidate)) candidates.push(candidate);
        }

        for (const candidate of candidates) {
            const result = await this.run(candidate, ['version'], VERSION_CHECK_TIMEOUT_SECONDS);
            if (result.success) return candidate;
        }
        return null;
    }
}

function defaultSdkPaths(): string[] {
    if (process.platform === 'win32') {
        const localAppData = process.env.LOCALAPPDATA ?? path.join(os.homedir(), 'AppData', 'Local');
        return [
            'C:\\Program Files (x86)\\Google\\Cloud SDK\\google-cloud-sdk\\bin\\gcloud.cmd',
            path.join(localAppData, 'Google', 'Cloud SDK', 'google-cloud-sdk', 'bin', 'gcloud.cmd'),
            'C:\\Program Files\\Google\\Cloud SDK\\google-cloud-sdk\\bin\\gcloud.cmd',
        ];
    }
    return [
        path.join(os.homedir(), 'google-cloud-sdk', 'bin', 'gcloud'),
        '/usr/lib/google-cloud-sdk/bin/gcloud',
        '/usr/local/google-cloud-sdk/bin/gcloud',
        '/opt/homebrew/share/google-cloud-sdk/bin/gcloud',
    ];
}
