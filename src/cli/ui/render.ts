import chalk from 'chalk';
import type { CommandFailure, CommandResult } from '../../commands/types.js';
import type { ProjectContext } from '../../project/context.js';

/**
 * Render the welcome banner for interactive mode
 */
export function renderBanner(meta: {
    version: string;
    project?: ProjectContext | null;
    pluginCount: number;
    commandCount: number;
    primaryTool: string;
}): void {
    const width = 48;
    const top = `╭${'─'.repeat(width)}╮`;
    const bottom = `╰${'─'.repeat(width)}╯`;

    const pad = (text: string, rawLen: number) => {
        const padding = width - rawLen;
        return `│ ${text}${' '.repeat(Math.max(0, padding - 1))}│`;
    };

    console.log();
    console.log(chalk.cyan(top));
    console.log(chalk.cyan(pad(
        `${chalk.bold('Plugin Assistant')} ${chalk.dim(`v${meta.version}`)}`,
        `Plugin Assistant v${meta.version}`.length,
    )));

    if (meta.project) {
        const projLine = `  Project: ${describeProject(meta.project)}`;
        console.log(chalk.cyan(pad(chalk.white(projLine), projLine.length)));
    }

    const infoLine = `  Tool: ${meta.primaryTool} │ ${meta.pluginCount} plugins │ ${meta.commandCount} commands`;
    console.log(chalk.cyan(pad(chalk.dim(infoLine), infoLine.length)));

    console.log(chalk.cyan(bottom));
    console.log();
    console.log(chalk.dim('  Type plugin:command, /sc:<shortcut>, or help.'));
    console.log();
}

/**
 * `name (language, framework)`
 */
export function describeProject(project: ProjectContext): string {
    const traits = [project.language, project.framework].filter((t): t is string => Boolean(t));
    return traits.length > 0 ? `${project.name} (${traits.join(', ')})` : project.name;
}

/**
 * Text form of a command's output: strings as-is, anything else as pretty JSON
 */
export function formatOutput(output: unknown): string {
    if (output === null || output === undefined) return '';
    if (typeof output === 'string') return output;
    return JSON.stringify(output, null, 2);
}

/**
 * `Error: <message>` followed by one indented line per suggestion
 */
export function formatFailure(result: CommandFailure): string[] {
    const lines = [`Error: ${result.error}`];
    if (result.suggestions && result.suggestions.length > 0) {
        lines.push('Suggestions:');
        for (const suggestion of result.suggestions) {
            lines.push(`  - ${suggestion}`);
        }
    }
    return lines;
}

/**
 * Successful output to stdout, failures to stderr
 */
export function printResult(result: CommandResult): void {
    if (result.success) {
        const text = formatOutput(result.output);
        if (text) process.stdout.write(text + '\n');
        return;
    }
    const [headline, ...rest] = formatFailure(result);
    process.stderr.write(chalk.red(headline) + '\n');
    for (const line of rest) {
        process.stderr.write(chalk.dim(line) + '\n');
    }
}

/**
 * Render a section separator
 */
export function renderSeparator(): void {
    console.log(chalk.dim('  ' + '─'.repeat(56)));
}

/**
 * Render an error that did not come from a command
 */
export function renderError(message: string): void {
    renderSeparator();
    console.log(chalk.red.bold(`  ✗ ${message}`));
    console.log();
}
