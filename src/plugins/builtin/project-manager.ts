import { mkdir, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fail, ok, toCommandResult } from '../../commands/result.js';
import type { CommandMap, CommandOptions, CommandResult } from '../../commands/types.js';
import { isDirectory, pathExists } from '../../utils/fs.js';
import { BuiltinPlugin } from './base.js';
import { PROJECT_TYPES, isProjectType, renderReadme, scaffoldFor, type DetectedType } from './templates.js';

const VENV_TIMEOUT_SECONDS = 120;
const NPM_INSTALL_TIMEOUT_SECONDS = 300;

/**
 * Project Manager — scaffolding, environment setup and README generation
 */
export class ProjectManagerPlugin extends BuiltinPlugin {
    readonly name = 'project-manager';
    readonly version = '1.0.0';
    readonly description = 'Project initialization and management tools';

    commands(): CommandMap {
        return {
            'init-project': (args) => this.initProject(args[0], args[1]),
            'setup-env': (args) => this.setupEnv(args[0]),
            'gen-readme': (args, options) => this.generateReadme(args[0], options),
        };
    }

    async initProject(type = 'python', name = 'my_project'): Promise<CommandResult> {
        const command = this.label('init-project');
        const projectType = type.toLowerCase();
        if (!isProjectType(projectType)) {
            return fail(command, `Unsupported project type: ${type}`, {
                suggestions: [`Supported types: ${PROJECT_TYPES.join(', ')}`],
            });
        }

        const projectPath = this.resolvePath(name);
        if (await pathExists(projectPath)) {
            return fail(command, `Directory ${name} already exists`);
        }

        const scaffold = scaffoldFor(projectType, path.basename(projectPath));
        await mkdir(projectPath, { recursive: true });
        for (const dir of scaffold.directories) {
            await mkdir(path.join(projectPath, dir), { recursive: true });
        }
        for (const [file, content] of Object.entries(scaffold.files)) {
            await writeFile(path.join(projectPath, file), content, 'utf-8');
        }

        this.context.logger.info(`Created ${projectType} project at ${projectPath}`);
        return ok(command, {
            projectPath,
            projectType,
            files: Object.keys(scaffold.files),
        });
    }

    async setupEnv(type = 'python'): Promise<CommandResult> {
        const envType = type.toLowerCase();

        if (envType === 'python') {
            const result = await this.run('python', ['-m', 'venv', '.venv'], VENV_TIMEOUT_SECONDS);
            if (!result.success) {
                return toCommandResult(result, null, ['Install Python 3 and make sure `python` is on PATH']);
            }
            return ok(result.command, {
                message: 'Python virtual environment created',
                activation: 'Run: source .venv/bin/activate (Linux/macOS) or .venv\\Scripts\\activate (Windows)',
            });
        }

        if (envType === 'javascript') {
            if (!(await pathExists(this.resolvePath('package.json')))) {
                return fail(this.label('setup-env'), 'No package.json found', {
                    suggestions: ['Create one with: project-manager:init-project javascript <name>'],
                });
            }
            const result = await this.run('npm', ['install'], NPM_INSTALL_TIMEOUT_SECONDS);
            if (!result.success) {
                return toCommandResult(result, null, ['Install Node.js and npm, then retry']);
            }
            return ok(result.command, { message: 'Node.js dependencies installed' });
        }

        return fail(this.label('setup-env'), `Unsupported environment type: ${type}`, {
            suggestions: [`Supported types: ${PROJECT_TYPES.join(', ')}`],
        });
    }

    async generateReadme(target = '.', options: CommandOptions = {}): Promise<CommandResult> {
        const command = this.label('gen-readme');
        const projectPath = this.resolvePath(target);

        if (!(await isDirectory(projectPath))) {
            return fail(command, `Path not found: ${target}`);
        }

        const readmePath = path.join(projectPath, 'README.md');
        if (options.force !== true && (await pathExists(readmePath))) {
            return fail(command, `README.md already exists in ${target}`, {
                suggestions: ['Pass --force to overwrite it'],
            });
        }

        const projectType = await detectProjectType(projectPath);
        await writeFile(readmePath, renderReadme(path.basename(projectPath), projectType), 'utf-8');

        return ok(command, { file: readmePath, projectType });
    }
}

export async function detectProjectType(dir: string): Promise<DetectedType> {
    if (await pathExists(path.join(dir, 'package.json'))) return 'JavaScript/Node.js';
    if (await pathExists(path.join(dir, 'requirements.txt'))) return 'Python';

    const entries = await readdir(dir);
    if (entries.some(entry => entry.endsWith('.py'))) return 'Python';
    if (entries.includes('pom.xml')) return 'Java/Maven';
    return 'Unknown';
}
