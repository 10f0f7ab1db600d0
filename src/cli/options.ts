import type { Command } from 'commander';

export interface GlobalOptions {
    configPath?: string;
    verbose?: boolean;
    interactive?: boolean;
}

/**
 * `-c`, `-v` and `-i` as given on the root program, seen from any subcommand
 */
export function globalOptions(command: Command): GlobalOptions {
    const { config, verbose, interactive } = command.optsWithGlobals();
    return {
        configPath: typeof config === 'string' ? config : undefined,
        verbose: verbose === true,
        interactive: interactive === true,
    };
}
