import { Command } from 'commander';
import chalk from 'chalk';
import { Assistant } from '../../assistant.js';
import { SHORTCUTS } from '../../commands/router.js';
import { globalOptions } from '../options.js';

export function createCommandsCommand(): Command {
    const cmd = new Command('commands')
        .description('Inspect routable commands');

    cmd.command('list')
        .description('List every plugin command and shortcut')
        .action(async (_opts: unknown, command: Command) => {
            const assistant = await Assistant.create(globalOptions(command));
            try {
                const commands = assistant.registry?.listCommands() ?? [];
                const primaryTool = assistant.config.assistant.primaryTool;

                if (commands.length === 0) {
                    console.log(chalk.dim('No plugin commands available.'));
                } else {
                    console.log(chalk.bold(`\nPlugin Commands (${commands.length})\n`));
                    for (const name of commands) {
                        console.log(`  ${chalk.cyan(name)}`);
                    }
                }

                console.log(chalk.bold('\nShortcuts\n'));
                for (const [name, target] of Object.entries(SHORTCUTS)) {
                    console.log(`  ${chalk.cyan(`/sc:${name}`)}  ${chalk.dim(`${primaryTool} ${target}`)}`);
                }

                console.log(chalk.dim(`\n  Run with: ${chalk.white('assistant <plugin>:<command> [args...]')}\n`));
            } finally {
                await assistant.shutdown();
            }
        });

    return cmd;
}
