import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { CommandResult } from '../../commands/types.js';

/**
 * Progress indicator for one routed command at a time. Drawn on stderr and
 * only when it is a terminal, so piped output stays clean.
 */
export class CommandSpinner {
    private readonly ora: Ora;
    private readonly now: () => number;

    constructor(options: { enabled?: boolean; now?: () => number } = {}) {
        this.ora = ora({
            color: 'cyan',
            spinner: 'dots',
            stream: process.stderr,
            isEnabled: options.enabled ?? process.stderr.isTTY === true,
        });
        this.now = options.now ?? Date.now;
    }

    /**
     * Spin while `run` works and settle on the result's outcome.
     * A rejection stops the spinner and propagates.
     */
    async track(label: string, run: () => Promise<CommandResult>): Promise<CommandResult> {
        const startedAt = this.now();
        this.ora.start(chalk.dim(`  ${label}`));

        let result: CommandResult;
        try {
            result = await run();
        } catch (err) {
            this.ora.stop();
            throw err;
        }

        const summary = `  ${label} ${chalk.dim(`(${formatElapsed(this.now() - startedAt)})`)}`;
        if (result.success) {
            this.ora.succeed(summary);
        } else {
            this.ora.fail(summary);
        }
        return result;
    }
}

/** `850ms`, `2.4s`, `1m 5s` */
export function formatElapsed(ms: number): string {
    if (ms < 1000) return `${Math.round(ms)}ms`;
    if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
    const minutes = Math.floor(ms / 60_000);
    const seconds = Math.round((ms % 60_000) / 1000);
    return `${minutes}m ${seconds}s`;
}
