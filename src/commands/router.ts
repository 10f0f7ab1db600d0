import { errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { PluginRegistry } from '../plugins/registry.js';
import type { Invoker } from '../process/types.js';
import type { TaskTracker } from '../tasks/tracker.js';
import { fail, fromError, toCommandResult } from './result.js';
import type { CommandOptions, CommandResult } from './types.js';

const SHORTCUT_PREFIX = '/sc:';

/** `/sc:<name>` → slash command of the primary tool */
export const SHORTCUTS: Readonly<Record<string, string>> = {
    build: '/build',
    implement: '/implement',
    analyze: '/analyze',
    improve: '/improve',
    test: '/test',
    document: '/document',
};

export interface CommandRouterOptions {
    /** null when the plugin subsystem is disabled or failed to start */
    registry: PluginRegistry | null;
    invoker: Invoker;
    tracker: TaskTracker;
    logger: Logger;
    primaryTool: string;
    primaryTimeoutSeconds: number;
    cwd: string;
}

export interface ParsedCommand {
    namespace: string;
    command: string;
}

/**
 * Split `<namespace>:<command>` on the first colon; null without one
 */
export function parseCommand(input: string): ParsedCommand | null {
    const separator = input.indexOf(':');
    if (separator < 0) return null;
    return { namespace: input.slice(0, separator), command: input.slice(separator + 1) };
}

/**
 * Separate `--key=value` and `--flag` tokens from positional arguments.
 * A bare `--` ends option parsing.
 */
export function splitArguments(tokens: readonly string[]): { args: string[]; options: CommandOptions } {
    const args: string[] = [];
    const options: CommandOptions = {};
    let parsingOptions = true;

    for (const token of tokens) {
        if (parsingOptions && token === '--') {
            parsingOptions = false;
            continue;
        }
        if (parsingOptions && token.startsWith('--') && token.length > 2) {
            const body = token.slice(2);
            const eq = body.indexOf('=');
            if (eq < 0) {
                options[body] = true;
                continue;
            }
            if (eq > 0) {
                options[body.slice(0, eq)] = body.slice(eq + 1);
                continue;
            }
        }
        args.push(token);
    }

    return { args, options };
}

/**
 * Whitespace-separated tokens; single or double quotes group, and a
 * backslash escapes the next character inside double quotes
 */
export function tokenize(line: string): string[] {
    const tokens: string[] = [];
    let current = '';
    let inToken = false;
    let quote: '"' | "'" | null = null;

    for (let i = 0; i < line.length; i++) {
        const ch = line.charAt(i);

        if (quote) {
            if (ch === quote) {
                quote = null;
            } else if (quote === '"' && ch === '\\' && i + 1 < line.length) {
                current += line.charAt(++i);
            } else {
                current += ch;
            }
            continue;
        }

        if (ch === '"' || ch === "'") {
            quote = ch;
            inToken = true;
        } else if (/\s/.test(ch)) {
            if (inToken) {
                tokens.push(current);
                current = '';
                inToken = false;
            }
        } else {
            current += ch;
            inToken = true;
        }
    }

    if (inToken) tokens.push(current);
    return tokens;
}

/**
 * Command Router — sends a command string to a plugin or to the primary tool
 *
 * Every routed command leaves a task in the tracker. Tracking is
 * best-effort and never changes the result.
 */
export class CommandRouter {
    constructor(private readonly options: CommandRouterOptions) {}

    /**
     * Tokenize a raw input line and route it
     */
    async execute(line: string): Promise<CommandResult> {
        const [command, ...args] = tokenize(line);
        if (!command) {
            return fail('', 'Empty command');
        }
        return this.route(command, args);
    }

    async route(command: string, args: readonly string[] = []): Promise<CommandResult> {
        const task = this.track('create', () =>
            this.options.tracker.create(`Execute: ${command}`, { context: { args: [...args] } }),
        );
        if (task) this.track('start', () => this.options.tracker.start(task.id));

        let result: CommandResult;
        try {
            result = await this.dispatch(command, args);
        } catch (err) {
            result = fromError(command, err);
        }

        if (task) {
            const failure = result.success ? null : result.error;
            this.track('finish', () => failure === null
                ? this.options.tracker.complete(task.id)
                : this.options.tracker.fail(task.id, failure));
        }
        return result;
    }

    private async dispatch(command: string, args: readonly string[]): Promise<CommandResult> {
        if (command.startsWith(SHORTCUT_PREFIX)) {
            const name = command.slice(SHORTCUT_PREFIX.length);
            const target = Object.hasOwn(SHORTCUTS, name) ? SHORTCUTS[name] : undefined;
            if (!target) {
                return fail(command, `Unknown shortcut command: ${name}`, {
                    suggestions: [`Available shortcuts: ${Object.keys(SHORTCUTS).map(s => SHORTCUT_PREFIX + s).join(', ')}`],
                });
            }
            return this.runPrimary(target, args);
        }

        const parsed = parseCommand(command);
        if (parsed) {
            const registry = this.options.registry;
            if (!registry) {
                return fail(command, 'Plugin system is not available', {
                    suggestions: ['Enable plugins in the configuration (plugins.enabled: true)'],
                });
            }
            const { args: positional, options } = splitArguments(args);
            this.options.logger.debug(`Routing to plugin ${parsed.namespace}`, { command: parsed.command });
            return registry.dispatch(`${parsed.namespace}:${parsed.command}`, positional, options);
        }

        return this.runPrimary(command, args);
    }

    private async runPrimary(command: string, args: readonly string[]): Promise<CommandResult> {
        const { primaryTool, primaryTimeoutSeconds, cwd } = this.options;
        const result = await this.options.invoker.run(primaryTool, [command, ...args], {
            timeoutSeconds: primaryTimeoutSeconds,
            cwd,
        });

        const suggestions = !result.success && result.code === 'TOOL_NOT_INSTALLED'
            ? [`Install ${primaryTool} or set assistant.primaryTool in the configuration`]
            : undefined;
        return toCommandResult(result, undefined, suggestions);
    }

    private track<T>(step: string, action: () => T): T | undefined {
        try {
            return action();
        } catch (err) {
            this.options.logger.warn(`Task tracking failed at ${step}: ${errorMessage(err)}`);
            return undefined;
        }
    }
}
