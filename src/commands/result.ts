import { z } from 'zod';
import { AssistantError, errorMessage, type ErrorCode } from '../errors.js';
import type { ProcessResult } from '../process/types.js';
import type { CommandFailure, CommandResult, CommandSuccess } from './types.js';

export function ok(command: string, output: unknown, suggestions?: string[]): CommandSuccess {
    const result: CommandSuccess = { success: true, output, error: null, command };
    if (suggestions && suggestions.length > 0) result.suggestions = suggestions;
    return result;
}

export function fail(
    command: string,
    error: string,
    extra: { output?: unknown; code?: ErrorCode; suggestions?: string[] } = {},
): CommandFailure {
    const result: CommandFailure = { success: false, output: extra.output ?? null, error, command };
    if (extra.code) result.code = extra.code;
    if (extra.suggestions && extra.suggestions.length > 0) result.suggestions = extra.suggestions;
    return result;
}

/**
 * Failure result for a thrown value, keeping the taxonomy code when there is one
 */
export function fromError(command: string, err: unknown, suggestions?: string[]): CommandFailure {
    return fail(command, errorMessage(err), {
        code: err instanceof AssistantError ? err.code : undefined,
        suggestions,
    });
}

/**
 * Adapt a ProcessResult; stdout becomes the output unless `output` is given
 */
export function toCommandResult(result: ProcessResult, output?: unknown, suggestions?: string[]): CommandResult {
    if (result.success) {
        return ok(result.command, output ?? result.stdout, suggestions);
    }
    return fail(result.command, result.error, {
        code: result.code,
        output: output ?? null,
        suggestions,
    });
}

const ERROR_CODES = [
    'PLUGIN_INIT',
    'PLUGIN_NAME_COLLISION',
    'TOOL_NOT_INSTALLED',
    'TIMEOUT',
    'NON_ZERO_EXIT',
    'MALFORMED_OUTPUT',
    'COMMAND_NOT_FOUND',
    'CONFIG_INVALID',
    'INVALID_TASK_TRANSITION',
] as const satisfies readonly ErrorCode[];

const CommandResultSchema = z.discriminatedUnion('success', [
    z.object({
        success: z.literal(true),
        output: z.unknown(),
        error: z.null(),
        command: z.string(),
        suggestions: z.array(z.string()).optional(),
    }),
    z.object({
        success: z.literal(false),
        output: z.unknown(),
        error: z.string(),
        command: z.string(),
        code: z.enum(ERROR_CODES).optional(),
        suggestions: z.array(z.string()).optional(),
    }),
]);

const LegacyErrorSchema = z.object({
    error: z.string(),
    suggestions: z.array(z.string()).optional(),
}).passthrough();

const ExplicitFailureSchema = z.object({
    success: z.literal(false),
}).passthrough();

/**
 * Normalize whatever a handler returned.
 *
 * Typed handlers already return a CommandResult and pass through unchanged.
 * Handlers from external units are untyped: an object carrying a string
 * `error` or `success: false` is a failure, any other value is successful
 * output.
 */
export function normalizeResult(command: string, value: unknown): CommandResult {
    const parsed = CommandResultSchema.safeParse(value);
    if (parsed.success) {
        return parsed.data;
    }

    const legacy = LegacyErrorSchema.safeParse(value);
    if (legacy.success) {
        const { error, suggestions, success: _success, ...rest } = legacy.data;
        return fail(command, error, {
            output: Object.keys(rest).length > 0 ? rest : null,
            suggestions,
        });
    }

    const explicit = ExplicitFailureSchema.safeParse(value);
    if (explicit.success) {
        const { success: _success, error: _error, message, ...rest } = explicit.data;
        return fail(command, typeof message === 'string' && message ? message : 'Command failed', {
            output: Object.keys(rest).length > 0 ? rest : null,
        });
    }

    return ok(command, value ?? null);
}
