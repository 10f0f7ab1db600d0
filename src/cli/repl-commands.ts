import chalk from 'chalk';
import type { Assistant } from '../assistant.js';
import { SHORTCUTS } from '../commands/router.js';
import { TASK_STATUSES, type Task, type TaskStatus } from '../tasks/types.js';
import { describeProject } from './ui/render.js';

export interface ReplCommandContext {
    assistant: Assistant;
    /** Line writer, console.log unless replaced */
    print: (line?: string) => void;
    clear: () => void;
}

/** 'exit' ends the loop */
export type ReplAction = 'continue' | 'exit';

export interface ReplCommand {
    name: string;
    aliases?: string[];
    description: string;
    execute: (args: string[], ctx: ReplCommandContext) => Promise<ReplAction>;
}

const TASK_LIMIT = 20;

const STATUS_MARKS: Record<TaskStatus, [string, (text: string) => string]> = {
    pending: ['○', chalk.dim],
    in_progress: ['◐', chalk.cyan],
    completed: ['●', chalk.green],
    failed: ['✗', chalk.red],
};

function isTaskStatus(value: string): value is TaskStatus {
    return TASK_STATUSES.some(status => status === value);
}

/**
 * REPL Command Registry — words the interactive loop handles itself
 * instead of routing them
 */
export class ReplCommandRegistry {
    private commands: Map<string, ReplCommand> = new Map();
    private aliases: Map<string, string> = new Map();

    constructor() {
        this.registerBuiltins();
    }

    private registerBuiltins(): void {
        this.register({
            name: 'help',
            description: 'Show available commands',
            execute: async (_args, { assistant, print }) => {
                print(chalk.bold('\n  Available Commands\n'));

                print(chalk.cyan.bold('  Built-in'));
                for (const cmd of this.list()) {
                    const names = [cmd.name, ...(cmd.aliases ?? [])].join(' | ');
                    print(`    ${chalk.white(names)}  ${chalk.dim(cmd.description)}`);
                }

                print(chalk.cyan.bold('\n  Shortcuts'));
                for (const [name, target] of Object.entries(SHORTCUTS)) {
                    print(`    ${chalk.white(`/sc:${name}`)}  ${chalk.dim(`${assistant.config.assistant.primaryTool} ${target}`)}`);
                }

                const plugins = assistant.registry?.listPlugins() ?? [];
                if (plugins.length > 0) {
                    print(chalk.cyan.bold('\n  Plugin Commands'));
                    for (const plugin of plugins) {
                        print(`    ${chalk.white(plugin.name)}  ${chalk.dim(plugin.commands.join(', '))}`);
                    }
                }

                print(chalk.dim(`\n  Anything else is passed to ${assistant.config.assistant.primaryTool}.\n`));
                return 'continue';
            },
        });

        this.register({
            name: 'status',
            description: 'Show session, plugin and task status',
            execute: async (_args, { assistant, print }) => {
                const { byStatus, total } = assistant.tracker.summary();
                const registry = assistant.registry;

                print(chalk.bold('\n  Status\n'));
                print(`    Session:     ${chalk.white(assistant.sessionId)}`);
                print(`    Directory:   ${chalk.white(assistant.cwd)}`);
                print(`    Config:      ${chalk.dim(assistant.configSource ?? 'defaults')}`);
                const primary = await assistant.checkPrimaryTool();
                print(`    Primary:     ${chalk.white(primary.tool)} ${primary.installed
                    ? chalk.dim(primary.version ?? 'installed')
                    : chalk.yellow('(not available)')}`);
                print(registry
                    ? `    Plugins:     ${registry.size} loaded, ${registry.listCommands().length} commands`
                    : `    Plugins:     ${chalk.yellow('unavailable')}`);
                print(`    Tasks:       ${total} total, ${byStatus.completed} completed, ${byStatus.failed} failed`);

                if (assistant.config.assistant.autoContext) {
                    const project = await assistant.context();
                    print(`    Project:     ${chalk.white(describeProject(project))}`);
                    if (project.packageManager) print(`    Packages:    ${project.packageManager}`);
                    print(`    Git:         ${project.gitRepo ? 'yes' : 'no'}`);
                }
                print();
                return 'continue';
            },
        });

        this.register({
            name: 'plugins',
            description: 'List loaded plugins',
            execute: async (_args, { assistant, print }) => {
                if (!assistant.registry) {
                    print(chalk.yellow('\n  Plugin system is not available.\n'));
                    return 'continue';
                }
                const plugins = assistant.registry.listPlugins();
                if (plugins.length === 0) {
                    print(chalk.dim('\n  No plugins loaded.\n'));
                    return 'continue';
                }
                print(chalk.bold(`\n  Plugins (${plugins.length})\n`));
                for (const plugin of plugins) {
                    const source = plugin.source === 'builtin' ? chalk.dim(' (built-in)') : chalk.dim(` (${plugin.source})`);
                    print(`    ${chalk.cyan.bold(plugin.name)} ${chalk.dim(`v${plugin.version}`)}${source}`);
                    print(`      ${plugin.description}`);
                    print(chalk.dim(`      ${plugin.commands.join(', ')}`));
                }
                print();
                return 'continue';
            },
        });

        this.register({
            name: 'tasks',
            description: `Show recent tasks (tasks [status])`,
            execute: async (args, { assistant, print }) => {
                const filter = args[0];
                if (filter !== undefined && !isTaskStatus(filter)) {
                    print(chalk.red(`  Unknown status "${filter}". Use one of: ${TASK_STATUSES.join(', ')}`));
                    return 'continue';
                }
                const tasks = assistant.tracker.list(filter);
                if (tasks.length === 0) {
                    print(chalk.dim('\n  No tasks yet.\n'));
                    return 'continue';
                }
                print(chalk.bold(`\n  Tasks (${tasks.length})\n`));
                for (const task of tasks.slice(-TASK_LIMIT)) {
                    print(`    ${formatTask(task)}`);
                }
                print();
                return 'continue';
            },
        });

        this.register({
            name: 'clear',
            description: 'Clear screen',
            execute: async (_args, { clear }) => {
                clear();
                return 'continue';
            },
        });

        this.register({
            name: 'quit',
            aliases: ['exit', 'q'],
            description: 'Exit interactive mode',
            execute: async () => 'exit',
        });
    }

    register(cmd: ReplCommand): void {
        this.commands.set(cmd.name, cmd);
        for (const alias of cmd.aliases ?? []) {
            this.aliases.set(alias, cmd.name);
        }
    }

    get(name: string): ReplCommand | undefined {
        return this.commands.get(this.aliases.get(name) ?? name);
    }

    has(name: string): boolean {
        return this.get(name) !== undefined;
    }

    list(): ReplCommand[] {
        return Array.from(this.commands.values());
    }

    /** Every word the registry answers to, aliases included */
    names(): string[] {
        return [...this.commands.keys(), ...this.aliases.keys()];
    }
}

export function formatTask(task: Task): string {
    const error = task.error ? chalk.red(` — ${task.error}`) : '';
    const [mark, color] = STATUS_MARKS[task.status];
    return `${color(mark)} ${chalk.dim(task.id)} ${task.description}${error}`;
}
