import os from 'node:os';
import path from 'node:path';

/**
 * Per-user assistant directory (~/.assistant)
 */
export function getAssistantDir(home: string = os.homedir()): string {
    return path.join(home, '.assistant');
}

/**
 * Default directory scanned for external plugin units
 */
export function getPluginsDir(home: string = os.homedir()): string {
    return path.join(getAssistantDir(home), 'plugins');
}

/**
 * Project-local assistant directory (<cwd>/.assistant)
 */
export function getProjectDir(cwd: string = process.cwd()): string {
    return path.join(cwd, '.assistant');
}

/**
 * SQLite ledger used when task persistence is enabled
 */
export function getTaskDbPath(cwd: string = process.cwd()): string {
    return path.join(getProjectDir(cwd), 'tasks.db');
}

/**
 * Expand a leading `~` and resolve against `base`
 */
export function resolveUserPath(input: string, base: string = process.cwd(), home: string = os.homedir()): string {
    if (input === '~') return home;
    if (input.startsWith('~/') || input.startsWith('~\\')) {
        return path.join(home, input.slice(2));
    }
    return path.resolve(base, input);
}
