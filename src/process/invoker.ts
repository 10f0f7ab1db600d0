import { execFile } from 'node:child_process';
import {
    NonZeroExitError,
    ProcessTimeoutError,
    ToolNotInstalledError,
    errorMessage,
    type AssistantError,
} from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { isDirectory } from '../utils/fs.js';
import type { InvokeOptions, Invoker, ProcessErrorCode, ProcessFailure, ProcessResult } from './types.js';

const KILL_SIGNAL = 'SIGKILL';
const MAX_BUFFER = 50 * 1024 * 1024; // 50MB — gcloud/gh JSON listings can be large

/** spawn error codes meaning the executable could not be started at all */
const NOT_STARTED_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR', 'EINVAL']);

export interface ProcessInvokerOptions {
    /** Timeout applied when a call does not pass its own */
    timeoutSeconds: number;
    logger?: Logger;
}

/**
 * Process Invoker — runs an external executable and normalizes the outcome
 *
 * No shell is involved, stdin is closed right away and both output streams
 * are trimmed. The invoker holds no per-call state, so one instance serves
 * every plugin.
 */
export class ProcessInvoker implements Invoker {
    private readonly timeoutSeconds: number;
    private readonly logger?: Logger;

    constructor(options: ProcessInvokerOptions) {
        this.timeoutSeconds = options.timeoutSeconds;
        this.logger = options.logger;
    }

    async run(executable: string, args: readonly string[] = [], options: InvokeOptions = {}): Promise<ProcessResult> {
        const timeoutSeconds = options.timeoutSeconds ?? this.timeoutSeconds;
        const command = formatCommand(executable, args);
        const start = Date.now();

        this.logger?.debug(`exec: ${command}`, { timeoutSeconds });

        // spawn reports a missing cwd as ENOENT, which would blame the executable
        if (options.cwd !== undefined && !(await isDirectory(options.cwd))) {
            const error = new NonZeroExitError(command, null, `Working directory not found: ${options.cwd}`);
            return failure(error, 'NON_ZERO_EXIT', {
                executable, command, timeoutSeconds, stdout: '', stderr: '', exitCode: null, durationMs: 0,
            });
        }

        return new Promise((resolve) => {
            const settle = (result: ProcessResult): void => {
                if (!result.success) {
                    this.logger?.debug(`failed (${result.code}): ${command}`, { durationMs: result.durationMs, error: result.error });
                }
                resolve(result);
            };

            try {
                const child = execFile(
                    executable,
                    [...args],
                    {
                        cwd: options.cwd,
                        env: options.env ?? process.env,
                        // execFile treats 0 as "no timeout"
                        timeout: Math.max(1, Math.ceil(timeoutSeconds * 1000)),
                        killSignal: KILL_SIGNAL,
                        maxBuffer: MAX_BUFFER,
                        windowsHide: true,
                        encoding: 'utf8',
                    },
                    (err, stdout, stderr) => {
                        const durationMs = Date.now() - start;
                        const out = stdout.trim();
                        const errOut = stderr.trim();

                        if (!err) {
                            this.logger?.debug(`exit 0: ${command}`, { durationMs });
                            settle({ success: true, error: null, command, stdout: out, stderr: errOut, exitCode: 0, durationMs });
                            return;
                        }
                        settle(classify(err, { executable, command, timeoutSeconds, stdout: out, stderr: errOut, durationMs }));
                    },
                );

                // Nothing is ever fed to the child
                child.stdin?.end();
            } catch (err) {
                settle(classifyStartError(err, {
                    executable, command, timeoutSeconds, stdout: '', stderr: '', durationMs: Date.now() - start,
                }));
            }
        });
    }
}

interface Outcome {
    executable: string;
    command: string;
    timeoutSeconds: number;
    stdout: string;
    stderr: string;
    durationMs: number;
}

/**
 * Map an execFile error onto the process error taxonomy
 */
function classify(err: Error, outcome: Outcome): ProcessFailure {
    const code: unknown = Reflect.get(err, 'code');
    const killed: unknown = Reflect.get(err, 'killed');
    const signal: unknown = Reflect.get(err, 'signal');

    if (typeof code === 'string' && NOT_STARTED_CODES.has(code)) {
        return failure(new ToolNotInstalledError(outcome.executable), 'TOOL_NOT_INSTALLED', {
            ...outcome,
            stdout: '',
            stderr: '',
            exitCode: null,
        });
    }

    if (killed === true && signal === KILL_SIGNAL && code !== 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
        return failure(new ProcessTimeoutError(outcome.command, outcome.timeoutSeconds), 'TIMEOUT', {
            ...outcome,
            exitCode: null,
        });
    }

    const exitCode = typeof code === 'number' ? code : null;
    const stderr = outcome.stderr || (code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER' ? err.message : '');
    return failure(
        new NonZeroExitError(outcome.command, exitCode, stderr, typeof signal === 'string' ? signal : undefined),
        'NON_ZERO_EXIT',
        { ...outcome, exitCode },
    );
}

/**
 * Map an error execFile threw before any process existed. Node's own
 * argument checks (`ERR_*`, such as a NUL byte in an argument) are the
 * caller's fault; an OS error means the executable could not be started.
 */
function classifyStartError(err: unknown, outcome: Outcome): ProcessFailure {
    const code: unknown = err instanceof Error ? Reflect.get(err, 'code') : undefined;
    if (typeof code === 'string' && code.startsWith('ERR_')) {
        return failure(new NonZeroExitError(outcome.command, null, errorMessage(err)), 'NON_ZERO_EXIT', {
            ...outcome,
            exitCode: null,
        });
    }
    return failure(new ToolNotInstalledError(outcome.executable), 'TOOL_NOT_INSTALLED', { ...outcome, exitCode: null });
}

function failure(
    error: AssistantError,
    code: ProcessErrorCode,
    fields: Outcome & { exitCode: number | null },
): ProcessFailure {
    return {
        success: false,
        error: error.message,
        code,
        command: fields.command,
        stdout: fields.stdout,
        stderr: fields.stderr,
        exitCode: fields.exitCode,
        durationMs: fields.durationMs,
    };
}

/**
 * Render an argv for diagnostics, quoting arguments that contain spaces
 */
export function formatCommand(executable: string, args: readonly string[]): string {
    return [executable, ...args]
        .map(part => (part === '' || /\s|"/.test(part) ? JSON.stringify(part) : part))
        .join(' ');
}
