/**
 * Process boundary — types
 *
 * Every external tool invocation is normalized into a ProcessResult,
 * whatever the way it ended.
 */

export type ProcessErrorCode = 'TOOL_NOT_INSTALLED' | 'TIMEOUT' | 'NON_ZERO_EXIT';

interface ProcessResultBase {
    /** Executable and arguments as run, for diagnostics */
    command: string;
    /** Trimmed standard output */
    stdout: string;
    /** Trimmed standard error */
    stderr: string;
    /** Exit code, null when the process never started or was killed */
    exitCode: number | null;
    durationMs: number;
}

export interface ProcessSuccess extends ProcessResultBase {
    success: true;
    error: null;
}

export interface ProcessFailure extends ProcessResultBase {
    success: false;
    error: string;
    code: ProcessErrorCode;
}

export type ProcessResult = ProcessSuccess | ProcessFailure;

export interface InvokeOptions {
    /** Overrides the invoker's default timeout */
    timeoutSeconds?: number;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Anything able to run an external executable. The real implementation is
 * ProcessInvoker; tests hand plugins a scripted stand-in.
 */
export interface Invoker {
    run(executable: string, args?: readonly string[], options?: InvokeOptions): Promise<ProcessResult>;
}
