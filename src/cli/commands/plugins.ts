import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { cp, mkdir, rm } from 'node:fs/promises';
import { Assistant, resolvePluginDirectory } from '../../assistant.js';
import { ConfigLoader } from '../../config/loader.js';
import { isPluginUnit } from '../../plugins/loader.js';
import { pathExists } from '../../utils/fs.js';
import { globalOptions } from '../options.js';

const UNIT_EXTENSIONS = ['', '.js', '.mjs', '.cjs'];

/**
 * Copy a unit (module file or manifest directory) into the plugin directory
 */
export async function installPlugin(sourcePath: string, pluginDir: string): Promise<string> {
    const absSource = path.resolve(sourcePath);
    if (!(await isPluginUnit(absSource))) {
        throw new Error(`${absSource} is not a plugin unit (expected a .js/.mjs/.cjs file or a directory with plugin.json)`);
    }

    const targetPath = path.join(pluginDir, path.basename(absSource));
    if (await pathExists(targetPath)) {
        throw new Error(`${path.basename(absSource)} is already installed in ${pluginDir}`);
    }

    await mkdir(pluginDir, { recursive: true });
    await cp(absSource, targetPath, { recursive: true });
    return targetPath;
}

/**
 * Delete an installed unit by directory name or file name, with or without extension
 */
export async function removePlugin(name: string, pluginDir: string): Promise<string | null> {
    if (!name || name !== path.basename(name) || name === '.' || name === '..') {
        throw new Error(`Invalid plugin name: ${name}`);
    }

    for (const extension of UNIT_EXTENSIONS) {
        const candidate = path.join(pluginDir, name + extension);
        if (await pathExists(candidate)) {
            await rm(candidate, { recursive: true, force: true });
            return candidate;
        }
    }
    return null;
}

async function pluginDirectoryFor(configPath?: string): Promise<string> {
    const config = await new ConfigLoader().load(configPath);
    return resolvePluginDirectory(config);
}

export function createPluginsCommand(): Command {
    const cmd = new Command('plugins')
        .description('Manage assistant plugins');

    // ─── List plugins ───
    cmd.command('list')
        .description('List loaded plugins and their commands')
        .action(async (_opts: unknown, command: Command) => {
            const assistant = await Assistant.create(globalOptions(command));
            try {
                const registry = assistant.registry;
                if (!registry) {
                    console.log(chalk.yellow('\nPlugin system is not available.\n'));
                    return;
                }

                const plugins = registry.listPlugins();
                console.log(chalk.bold(`\nLoaded Plugins (${plugins.length})\n`));
                for (const plugin of plugins) {
                    const source = plugin.source === 'builtin' ? 'built-in' : plugin.source;
                    console.log(`  ${chalk.cyan.bold(plugin.name)} ${chalk.dim(`v${plugin.version}`)} ${chalk.dim(`(${source})`)}`);
                    console.log(`    ${plugin.description}`);
                    console.log(chalk.dim(`    Commands: ${plugin.commands.join(', ')}`));
                    console.log();
                }
                console.log(chalk.dim(`Install external plugins with:\n  ${chalk.white('assistant plugins install <path>')}\n`));
            } finally {
                await assistant.shutdown();
            }
        });

    // ─── Install a plugin ───
    cmd.command('install')
        .description('Install a plugin unit from a local path')
        .argument('<path>', 'Module file or plugin directory')
        .action(async (sourcePath: string, _opts: unknown, command: Command) => {
            const pluginDir = await pluginDirectoryFor(globalOptions(command).configPath);
            const targetPath = await installPlugin(sourcePath, pluginDir);

            console.log(chalk.green(`✓ Plugin installed to ${targetPath}`));
            console.log(chalk.dim('  It will be loaded on the next assistant run.'));
        });

    // ─── Remove a plugin ───
    cmd.command('remove')
        .description('Remove an installed plugin unit')
        .argument('<name>', 'Unit file or directory name')
        .action(async (name: string, _opts: unknown, command: Command) => {
            const pluginDir = await pluginDirectoryFor(globalOptions(command).configPath);
            const removed = await removePlugin(name, pluginDir);
            if (!removed) {
                throw new Error(`Plugin "${name}" not found in ${pluginDir}`);
            }
            console.log(chalk.green(`✓ Plugin "${name}" removed`));
        });

    return cmd;
}
