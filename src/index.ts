// Plugin Assistant — Public API Surface
export { Assistant, VERSION, resolvePluginDirectory } from './assistant.js';
export { createCLI, runCommand } from './cli/index.js';
export { CommandRouter, SHORTCUTS, parseCommand, splitArguments, tokenize } from './commands/router.js';
export { ok, fail, fromError, normalizeResult, toCommandResult } from './commands/result.js';
export { ConfigLoader } from './config/loader.js';
export { Logger } from './logging/logger.js';
export { PluginRegistry } from './plugins/registry.js';
export { PluginLoader } from './plugins/loader.js';
export { BUILTIN_PLUGINS, BuiltinPlugin } from './plugins/builtin/index.js';
export { ProcessInvoker } from './process/invoker.js';
export { parseJsonOutput } from './process/json.js';
export { detectProjectContext } from './project/context.js';
export { TaskTracker } from './tasks/tracker.js';
export { MemoryTaskStore, SqliteTaskStore } from './tasks/store.js';
export * from './errors.js';

// Types
export type { AssistantOptions, PrimaryToolStatus } from './assistant.js';
export type { CommandResult, CommandSuccess, CommandFailure, CommandHandler, CommandMap, CommandOptions } from './commands/types.js';
export type { AssistantConfig } from './config/schema.js';
export type { LogEntry, LogLevel, LogSink } from './logging/logger.js';
export type { Plugin, PluginContext, PluginDescriptor, PluginFactory, PluginManifest } from './plugins/types.js';
export type { Invoker, InvokeOptions, ProcessResult } from './process/types.js';
export type { ProjectContext } from './project/context.js';
export type { Task, TaskStatus, TaskPriority, TaskStore } from './tasks/types.js';
