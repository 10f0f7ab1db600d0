import { createInterface } from 'node:readline';
import chalk from 'chalk';
import { Assistant, VERSION } from '../assistant.js';
import { SHORTCUTS, tokenize } from '../commands/router.js';
import { errorMessage } from '../errors.js';
import { ReplCommandRegistry, type ReplCommandContext } from './repl-commands.js';
import { printResult, renderBanner, renderError } from './ui/render.js';
import { CommandSpinner } from './ui/spinner.js';

export interface ReplOptions {
    configPath?: string;
    verbose?: boolean;
}

/**
 * Interactive REPL
 *
 * Launched when `assistant` runs without a command or with `-i`. Each line
 * is awaited before the next one is read, so commands never overlap.
 */
export async function startREPL(options: ReplOptions = {}): Promise<void> {
    const assistant = await Assistant.create(options);

    const project = assistant.config.assistant.autoContext ? await assistant.context() : null;
    const primary = await assistant.checkPrimaryTool();
    renderBanner({
        version: VERSION,
        project,
        pluginCount: assistant.registry?.size ?? 0,
        commandCount: assistant.registry?.listCommands().length ?? 0,
        primaryTool: primary.installed ? primary.tool : `${primary.tool} (not found)`,
    });

    const builtins = new ReplCommandRegistry();
    const ctx: ReplCommandContext = {
        assistant,
        print: (line = '') => console.log(line),
        clear: () => console.clear(),
    };
    const spinner = new CommandSpinner();

    const completions = [
        ...builtins.names(),
        ...Object.keys(SHORTCUTS).map(name => `/sc:${name}`),
        ...(assistant.registry?.listCommands() ?? []),
    ];

    const rl = createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: chalk.cyan('  > '),
        terminal: process.stdin.isTTY === true,
        completer: (line: string) => {
            const hits = completions.filter(c => c.startsWith(line));
            return [hits.length ? hits : completions, line];
        },
    });
    rl.on('SIGINT', () => rl.close());

    rl.prompt();
    try {
        for await (const input of rl) {
            const line = input.trim();
            if (!line) {
                rl.prompt();
                continue;
            }

            const [word = '', ...rest] = tokenize(line);
            const builtin = builtins.get(word);
            try {
                if (builtin) {
                    if (await builtin.execute(rest, ctx) === 'exit') break;
                } else {
                    printResult(await spinner.track(word, () => assistant.execute(line)));
                }
            } catch (err) {
                renderError(errorMessage(err));
            }
            rl.prompt();
        }
    } finally {
        rl.close();
        await assistant.shutdown();
        console.log(chalk.dim('\n  Goodbye!\n'));
    }
}
