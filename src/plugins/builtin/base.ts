import path from 'node:path';
import type { CommandMap } from '../../commands/types.js';
import type { ProcessResult } from '../../process/types.js';
import type { Plugin, PluginContext } from '../types.js';

/** Constructs one built-in plugin */
export type BuiltinFactory = () => Plugin;

/**
 * Common ground for the plugins shipped with the assistant: keeps the
 * context handed to `initialize` and runs tools in the working directory.
 */
export abstract class BuiltinPlugin implements Plugin {
    abstract readonly name: string;
    abstract readonly version: string;
    abstract readonly description: string;

    private ctx: PluginContext | null = null;

    async initialize(context: PluginContext): Promise<boolean> {
        this.ctx = context;
        return this.setup(context);
    }

    abstract commands(): CommandMap;

    /**
     * Plugin-specific start-up (tool detection); true by default
     */
    protected async setup(_context: PluginContext): Promise<boolean> {
        return true;
    }

    protected get context(): PluginContext {
        if (!this.ctx) {
            throw new Error(`Plugin "${this.name}" used before initialize`);
        }
        return this.ctx;
    }

    /** `<plugin>:<command>`, the echo for results that ran no process */
    protected label(command: string): string {
        return `${this.name}:${command}`;
    }

    protected resolvePath(target = '.'): string {
        return path.resolve(this.context.cwd, target);
    }

    /**
     * Run a tool through the shared invoker, in the working directory unless `cwd` is given
     */
    protected run(
        executable: string,
        args: readonly string[],
        timeoutSeconds?: number,
        cwd: string = this.context.cwd,
    ): Promise<ProcessResult> {
        return this.context.invoker.run(executable, args, { cwd, timeoutSeconds });
    }
}
