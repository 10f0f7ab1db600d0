import { fail, fromError, normalizeResult } from '../commands/result.js';
import type { CommandEntry, CommandHandler, CommandOptions, CommandResult } from '../commands/types.js';
import { CommandNotFoundError, PluginInitError, PluginNameCollisionError, errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { BUILTIN_PLUGINS, type BuiltinFactory } from './builtin/index.js';
import { PluginLoader, type LoadedUnit } from './loader.js';
import type { Plugin, PluginContext, PluginDescriptor } from './types.js';

export interface PluginRegistryOptions {
    context: PluginContext;
    /** Built-in factories in registration order */
    builtins?: readonly BuiltinFactory[];
    loader?: PluginLoader;
    /** Plugin names to refuse; defaults to `plugins.disabled` from the config */
    disabled?: readonly string[];
}

interface RegisteredPlugin {
    plugin: Plugin;
    descriptor: PluginDescriptor;
}

/**
 * Plugin Registry — owns the loaded plugins and the flat command table
 *
 * Names are first-come: a later plugin with a taken name is rejected and
 * logged. After `seal()` the table no longer changes; dispatch never throws.
 */
export class PluginRegistry {
    private readonly plugins = new Map<string, RegisteredPlugin>();
    private readonly commands = new Map<string, CommandEntry>();
    /** Names whose initialize is still running */
    private readonly pending = new Set<string>();
    private readonly disabled: Set<string>;
    private readonly builtins: readonly BuiltinFactory[];
    private readonly loader: PluginLoader;
    private readonly logger: Logger;
    private sealed = false;
    private cleanedUp = false;

    constructor(private readonly options: PluginRegistryOptions) {
        this.logger = options.context.logger.child('registry');
        this.builtins = options.builtins ?? BUILTIN_PLUGINS;
        this.loader = options.loader ?? new PluginLoader(options.context.logger.child('loader'));
        this.disabled = new Set(options.disabled ?? options.context.config.plugins.disabled);
    }

    /**
     * Initialize a plugin and add its commands to the table
     *
     * @param source - 'builtin' or the path of the unit the plugin came from
     * @returns whether the plugin was registered
     */
    async register(plugin: Plugin, source = 'builtin'): Promise<boolean> {
        const name = plugin.name;

        if (this.sealed) {
            this.logger.warn(`Registry is sealed; ignoring plugin "${name}" from ${source}`);
            return false;
        }
        if (!name || name.includes(':')) {
            this.logger.error(`Invalid plugin name ${JSON.stringify(name)} from ${source}`);
            return false;
        }
        if (this.disabled.has(name)) {
            this.logger.info(`Plugin "${name}" is disabled by configuration`);
            return false;
        }
        if (this.plugins.has(name) || this.pending.has(name)) {
            this.logger.warn(new PluginNameCollisionError(name, source).message);
            return false;
        }

        this.pending.add(name);
        try {
            return await this.initialize(plugin, source);
        } finally {
            this.pending.delete(name);
        }
    }

    private async initialize(plugin: Plugin, source: string): Promise<boolean> {
        const name = plugin.name;

        let ready: boolean;
        try {
            ready = await plugin.initialize(this.options.context);
        } catch (err) {
            this.logger.error(new PluginInitError(name, errorMessage(err)).message, { source });
            return false;
        }
        if (ready !== true) {
            this.logger.warn(`Plugin "${name}" declined to initialize`, { source });
            return false;
        }

        let entries: [string, CommandHandler][];
        try {
            entries = Object.entries(plugin.commands());
        } catch (err) {
            this.logger.error(new PluginInitError(name, `commands() failed: ${errorMessage(err)}`).message, { source });
            return false;
        }

        const commandNames: string[] = [];
        for (const [command, handler] of entries) {
            if (!command || typeof handler !== 'function') {
                this.logger.warn(`Plugin "${name}" exposes an invalid command ${JSON.stringify(command)}; skipped`);
                continue;
            }
            const fullName = `${name}:${command}`;
            // Copy the bound handler so later changes to the plugin's map do not leak in
            this.commands.set(fullName, {
                fullName,
                plugin: name,
                handler: (args, options) => handler.call(plugin, args, options),
            });
            commandNames.push(command);
        }

        const descriptor: PluginDescriptor = {
            name,
            version: plugin.version,
            description: plugin.description,
            commands: commandNames,
            source,
        };
        this.plugins.set(name, { plugin, descriptor });
        this.logger.debug(`Registered plugin "${name}" v${plugin.version}`, { source, commands: commandNames.length });
        return true;
    }

    /**
     * Register the built-in plugins in their declared order
     */
    async loadBuiltins(): Promise<number> {
        let count = 0;
        for (const factory of this.builtins) {
            let plugin: Plugin;
            try {
                plugin = factory();
            } catch (err) {
                this.logger.error(`Failed to construct a built-in plugin: ${errorMessage(err)}`);
                continue;
            }
            if (await this.register(plugin, 'builtin')) count++;
        }
        return count;
    }

    /**
     * Register every plugin found in an external plugin directory
     */
    async loadExternal(directory: string): Promise<number> {
        let units: LoadedUnit[];
        try {
            units = await this.loader.discover(directory);
        } catch (err) {
            this.logger.error(`Failed to scan plugin directory ${directory}: ${errorMessage(err)}`);
            return 0;
        }

        let count = 0;
        for (const unit of units) {
            for (const plugin of unit.plugins) {
                if (await this.register(plugin, unit.path)) count++;
            }
        }
        return count;
    }

    /**
     * Built-ins, then the external directory, then seal
     */
    async loadAll(directory?: string): Promise<PluginDescriptor[]> {
        await this.loadBuiltins();
        if (directory) {
            await this.loadExternal(directory);
        }
        this.seal();
        this.logger.info(`Loaded ${this.plugins.size} plugins with ${this.commands.size} commands`);
        return this.listPlugins();
    }

    seal(): void {
        this.sealed = true;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    has(fullName: string): boolean {
        return this.commands.has(fullName);
    }

    /**
     * Run a command by its full name. Failures always come back as a result.
     */
    async dispatch(fullName: string, args: readonly string[] = [], options: CommandOptions = {}): Promise<CommandResult> {
        const entry = this.commands.get(fullName);
        if (!entry) {
            const err = new CommandNotFoundError(fullName);
            return fail(fullName, err.message, {
                code: err.code,
                suggestions: this.suggest(fullName),
            });
        }

        this.logger.debug(`dispatch ${fullName}`, { args: args.length });
        try {
            const value: unknown = await entry.handler([...args], { ...options });
            return normalizeResult(fullName, value);
        } catch (err) {
            this.logger.error(`Command ${fullName} failed: ${errorMessage(err)}`);
            return fromError(fullName, err);
        }
    }

    /**
     * Commands of the same plugin, for a mistyped command name
     */
    private suggest(fullName: string): string[] {
        const separator = fullName.indexOf(':');
        if (separator < 0) return [];
        const pluginName = fullName.slice(0, separator);
        const registered = this.plugins.get(pluginName);
        if (!registered) return [];
        return [`Available commands: ${registered.descriptor.commands.map(c => `${pluginName}:${c}`).join(', ')}`];
    }

    listPlugins(): PluginDescriptor[] {
        return Array.from(this.plugins.values(), ({ descriptor }) => ({
            ...descriptor,
            commands: [...descriptor.commands],
        }));
    }

    getPlugin(name: string): PluginDescriptor | undefined {
        const registered = this.plugins.get(name);
        return registered ? { ...registered.descriptor, commands: [...registered.descriptor.commands] } : undefined;
    }

    listCommands(): string[] {
        return Array.from(this.commands.keys());
    }

    /**
     * Run every plugin's cleanup once, in registration order
     */
    async cleanup(): Promise<void> {
        if (this.cleanedUp) return;
        this.cleanedUp = true;

        for (const { plugin } of this.plugins.values()) {
            if (!plugin.cleanup) continue;
            try {
                await plugin.cleanup();
            } catch (err) {
                this.logger.error(`Cleanup of plugin "${plugin.name}" failed: ${errorMessage(err)}`);
            }
        }
    }

    get size(): number {
        return this.plugins.size;
    }
}
