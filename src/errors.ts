/**
 * Error taxonomy shared by the registry, the invoker and the router.
 *
 * Load-time errors are logged at the registry boundary; dispatch-time errors
 * are folded into a CommandResult. Neither is ever rethrown to the caller.
 */

export type ErrorCode =
    | 'PLUGIN_INIT'
    | 'PLUGIN_NAME_COLLISION'
    | 'TOOL_NOT_INSTALLED'
    | 'TIMEOUT'
    | 'NON_ZERO_EXIT'
    | 'MALFORMED_OUTPUT'
    | 'COMMAND_NOT_FOUND'
    | 'CONFIG_INVALID'
    | 'INVALID_TASK_TRANSITION';

export class AssistantError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly details?: Record<string, unknown>,
    ) {
        super(message);
        this.name = 'AssistantError';
    }
}

export class PluginInitError extends AssistantError {
    constructor(plugin: string, reason: string) {
        super(`Failed to initialize plugin "${plugin}": ${reason}`, 'PLUGIN_INIT', { plugin });
        this.name = 'PluginInitError';
    }
}

export class PluginNameCollisionError extends AssistantError {
    constructor(plugin: string, source: string) {
        super(`Plugin "${plugin}" is already registered; ignoring the copy from ${source}`, 'PLUGIN_NAME_COLLISION', {
            plugin,
            source,
        });
        this.name = 'PluginNameCollisionError';
    }
}

export class ToolNotInstalledError extends AssistantError {
    constructor(executable: string) {
        super(`"${executable}" is not installed or could not be started`, 'TOOL_NOT_INSTALLED', { executable });
        this.name = 'ToolNotInstalledError';
    }
}

export class ProcessTimeoutError extends AssistantError {
    constructor(command: string, timeoutSeconds: number) {
        super(`Command timed out after ${timeoutSeconds}s`, 'TIMEOUT', { command, timeoutSeconds });
        this.name = 'ProcessTimeoutError';
    }
}

export class NonZeroExitError extends AssistantError {
    constructor(command: string, exitCode: number | null, stderr: string, signal?: string) {
        super(
            stderr || (signal ? `Process terminated by signal ${signal}` : `Process exited with code ${exitCode}`),
            'NON_ZERO_EXIT',
            { command, exitCode, signal },
        );
        this.name = 'NonZeroExitError';
    }
}

export class MalformedOutputError extends AssistantError {
    constructor(source: string, reason: string) {
        super(`Failed to parse output of ${source}: ${reason}`, 'MALFORMED_OUTPUT', { source });
        this.name = 'MalformedOutputError';
    }
}

export class CommandNotFoundError extends AssistantError {
    constructor(command: string) {
        super(`Command not found: ${command}`, 'COMMAND_NOT_FOUND', { command });
        this.name = 'CommandNotFoundError';
    }
}

export class ConfigError extends AssistantError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, 'CONFIG_INVALID', { issues });
        this.name = 'ConfigError';
    }
}

export class InvalidTaskTransitionError extends AssistantError {
    constructor(taskId: string, from: string, to: string) {
        super(`Task ${taskId} cannot move from ${from} to ${to}`, 'INVALID_TASK_TRANSITION', { taskId, from, to });
        this.name = 'InvalidTaskTransitionError';
    }
}

/**
 * Message of anything that was thrown
 */
export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
