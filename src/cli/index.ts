import { Command } from 'commander';
import { Assistant, VERSION, type AssistantOptions } from '../assistant.js';
import { createCommandsCommand } from './commands/commands-cmd.js';
import { createPluginsCommand } from './commands/plugins.js';
import { globalOptions } from './options.js';
import { startREPL } from './repl.js';
import { printResult } from './ui/render.js';

/**
 * Route one command given on the command line and print its result.
 * Resolves to the process exit code.
 */
export async function runCommand(words: readonly string[], options: AssistantOptions = {}): Promise<number> {
    const [command, ...args] = words;
    if (!command) {
        throw new Error('No command given');
    }

    const assistant = await Assistant.create(options);
    try {
        const result = await assistant.route(command, args);
        printResult(result);
        return result.success ? 0 : 1;
    } finally {
        await assistant.shutdown();
    }
}

export function createCLI(): Command {
    const program = new Command('assistant')
        .description('Route plugin:command strings to plugins, /sc: shortcuts and the primary tool')
        .version(VERSION)
        .argument('[command...]', 'Command to run, e.g. github:status or code-analyzer:analyze-complexity src')
        .option('-c, --config <path>', 'Configuration file')
        .option('-i, --interactive', 'Start the interactive loop')
        .option('-v, --verbose', 'Debug logging')
        .passThroughOptions()
        .action(async (words: string[], _opts: unknown, command: Command) => {
            const options = globalOptions(command);
            if (options.interactive || words.length === 0) {
                await startREPL(options);
                return;
            }
            process.exitCode = await runCommand(words, options);
        });

    program.addCommand(createPluginsCommand());
    program.addCommand(createCommandsCommand());

    return program;
}
