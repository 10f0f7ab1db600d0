import { randomUUID } from 'node:crypto';
import os from 'node:os';
import { CommandRouter } from './commands/router.js';
import type { CommandResult } from './commands/types.js';
import { ConfigLoader } from './config/loader.js';
import type { AssistantConfig } from './config/schema.js';
import { errorMessage } from './errors.js';
import { Logger, type LogSink } from './logging/logger.js';
import type { BuiltinFactory } from './plugins/builtin/index.js';
import { PluginRegistry } from './plugins/registry.js';
import { ProcessInvoker } from './process/invoker.js';
import type { Invoker } from './process/types.js';
import { detectProjectContext, type ProjectContext } from './project/context.js';
import { MemoryTaskStore, SqliteTaskStore } from './tasks/store.js';
import { TaskTracker } from './tasks/tracker.js';
import type { TaskStore } from './tasks/types.js';
import { getPluginsDir, getTaskDbPath, resolveUserPath } from './utils/paths.js';

export const VERSION = '0.1.0';

const VERSION_CHECK_TIMEOUT_SECONDS = 10;

/** Outcome of `<primaryTool> --version` */
export interface PrimaryToolStatus {
    tool: string;
    installed: boolean;
    /** First line of the version output */
    version: string | null;
    error: string | null;
}

export interface AssistantOptions {
    /** Explicit config file (`--config`) */
    configPath?: string;
    /** Already-loaded configuration; skips the file lookup */
    config?: AssistantConfig;
    cwd?: string;
    home?: string;
    /** Lowers the log level to debug */
    verbose?: boolean;
    /** Replaces the process invoker (tests) */
    invoker?: Invoker;
    /** Replaces the built-in plugin list (tests) */
    builtins?: readonly BuiltinFactory[];
    /** Replaces the console log sink */
    logSink?: LogSink;
}

/**
 * Assistant — the startup context
 *
 * Builds the logger, invoker, registry, tracker and router once and hands
 * them out; `shutdown()` releases them.
 */
export class Assistant {
    readonly sessionId = randomUUID().slice(0, 8);
    private projectContext: ProjectContext | null = null;
    private primaryToolStatus: Promise<PrimaryToolStatus> | null = null;

    private constructor(
        readonly config: AssistantConfig,
        readonly configSource: string | null,
        readonly logger: Logger,
        readonly invoker: Invoker,
        /** null when plugins are disabled or failed to load */
        readonly registry: PluginRegistry | null,
        readonly tracker: TaskTracker,
        readonly router: CommandRouter,
        readonly cwd: string,
        readonly pluginDirectory: string,
    ) {}

    static async create(options: AssistantOptions = {}): Promise<Assistant> {
        const cwd = options.cwd ?? process.cwd();
        const home = options.home ?? os.homedir();

        const configLoader = new ConfigLoader({ cwd, home });
        const config = options.config ?? await configLoader.load(options.configPath);

        const logger = new Logger({
            level: options.verbose ? 'debug' : config.logging.level,
            filePath: config.logging.file ? resolveUserPath(config.logging.file, cwd, home) : undefined,
            sink: options.logSink,
        });
        if (configLoader.source) {
            logger.debug(`Configuration loaded from ${configLoader.source}`);
        }

        const invoker = options.invoker ?? new ProcessInvoker({
            timeoutSeconds: config.process.timeoutSeconds,
            logger: logger.child('process'),
        });

        const tracker = new TaskTracker({
            store: openTaskStore(config, cwd, logger),
            logger: logger.child('tasks'),
        });

        const pluginDirectory = resolvePluginDirectory(config, cwd, home);
        const registry = await startPlugins({ config, logger, invoker, cwd, pluginDirectory, builtins: options.builtins });

        const router = new CommandRouter({
            registry,
            invoker,
            tracker,
            logger: logger.child('router'),
            primaryTool: config.assistant.primaryTool,
            primaryTimeoutSeconds: config.assistant.primaryTimeoutSeconds,
            cwd,
        });

        return new Assistant(config, configLoader.source, logger, invoker, registry, tracker, router, cwd, pluginDirectory);
    }

    execute(line: string): Promise<CommandResult> {
        return this.router.execute(line);
    }

    route(command: string, args: readonly string[] = []): Promise<CommandResult> {
        return this.router.route(command, args);
    }

    /**
     * Project detected in the working directory, computed once
     */
    async context(): Promise<ProjectContext> {
        if (!this.projectContext) {
            this.projectContext = await detectProjectContext(this.cwd);
            this.logger.debug(`Project context: ${this.projectContext.language ?? 'unknown'}/${this.projectContext.framework ?? 'none'}`);
        }
        return this.projectContext;
    }

    /**
     * Whether the primary tool can be started; checked once per session
     */
    checkPrimaryTool(): Promise<PrimaryToolStatus> {
        if (!this.primaryToolStatus) {
            this.primaryToolStatus = this.readPrimaryToolVersion();
        }
        return this.primaryToolStatus;
    }

    private async readPrimaryToolVersion(): Promise<PrimaryToolStatus> {
        const tool = this.config.assistant.primaryTool;
        const result = await this.invoker.run(tool, ['--version'], { timeoutSeconds: VERSION_CHECK_TIMEOUT_SECONDS, cwd: this.cwd });
        if (!result.success) {
            this.logger.warn(`Primary tool ${tool} is not available: ${result.error}`);
            return { tool, installed: false, version: null, error: result.error };
        }

        const version = result.stdout.split('\n')[0] || null;
        this.logger.info(`Primary tool ${tool} found${version ? `: ${version}` : ''}`);
        return { tool, installed: true, version, error: null };
    }

    async shutdown(): Promise<void> {
        await this.registry?.cleanup();
        try {
            this.tracker.close();
        } catch (err) {
            this.logger.warn(`Failed to close the task store: ${errorMessage(err)}`);
        }
    }
}

/**
 * Directory scanned for external units: `plugins.directory`, else ~/.assistant/plugins
 */
export function resolvePluginDirectory(config: AssistantConfig, cwd = process.cwd(), home = os.homedir()): string {
    return config.plugins.directory
        ? resolveUserPath(config.plugins.directory, cwd, home)
        : getPluginsDir(home);
}

function openTaskStore(config: AssistantConfig, cwd: string, logger: Logger): TaskStore {
    if (!config.assistant.taskPersistence) {
        return new MemoryTaskStore();
    }
    const dbPath = getTaskDbPath(cwd);
    try {
        return new SqliteTaskStore(dbPath);
    } catch (err) {
        logger.warn(`Cannot open task database ${dbPath}, keeping tasks in memory: ${errorMessage(err)}`);
        return new MemoryTaskStore();
    }
}

interface PluginStartup {
    config: AssistantConfig;
    logger: Logger;
    invoker: Invoker;
    cwd: string;
    pluginDirectory: string;
    builtins?: readonly BuiltinFactory[];
}

/**
 * Load and seal the registry; the assistant runs without plugins when this fails
 */
async function startPlugins(startup: PluginStartup): Promise<PluginRegistry | null> {
    const { config, logger, invoker, cwd, pluginDirectory, builtins } = startup;
    if (!config.plugins.enabled) {
        logger.info('Plugin system disabled by configuration');
        return null;
    }

    try {
        const registry = new PluginRegistry({
            context: { logger: logger.child('plugins'), invoker, cwd, config },
            builtins,
        });
        await registry.loadAll(pluginDirectory);
        return registry;
    } catch (err) {
        logger.error(`Plugin system failed to start: ${errorMessage(err)}`);
        return null;
    }
}
