/**
 * Command System — Types
 *
 * Every plugin command, whatever it does, answers with a CommandResult.
 * Success and failure share one shape so callers never branch on type.
 */

import type { ErrorCode } from '../errors.js';

interface CommandResultBase {
    /** Structured value or text produced by the command */
    output: unknown;
    /** Diagnostic echo of what ran */
    command: string;
    /** Remediation hints from the handler, passed through untouched */
    suggestions?: string[];
}

export interface CommandSuccess extends CommandResultBase {
    success: true;
    error: null;
}

export interface CommandFailure extends CommandResultBase {
    success: false;
    error: string;
    code?: ErrorCode;
}

export type CommandResult = CommandSuccess | CommandFailure;

/**
 * Keyed options parsed from `--flag` and `--key=value` tokens
 */
export type CommandOptions = Record<string, string | boolean>;

export type CommandHandler = (
    args: string[],
    options: CommandOptions,
) => CommandResult | Promise<CommandResult>;

export type CommandMap = Record<string, CommandHandler>;

/**
 * Flattened command-table entry
 */
export interface CommandEntry {
    /** `<plugin>:<command>` */
    fullName: string;
    handler: CommandHandler;
    /** Name of the owning plugin */
    plugin: string;
}
