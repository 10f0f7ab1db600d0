import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { isDirectory, pathExists } from '../utils/fs.js';
import { PluginManifestSchema, isPlugin, type Plugin, type PluginManifest } from './types.js';

/** Loads a module by absolute path; swapped out in tests */
export type ModuleImporter = (filePath: string) => Promise<unknown>;

const MODULE_EXTENSIONS = new Set(['.js', '.mjs', '.cjs']);
const FACTORY_EXPORT = 'createPlugins';
const MANIFEST_FILE = 'plugin.json';

export interface LoadedUnit {
    /** Absolute path of the file or directory the plugins came from */
    path: string;
    plugins: Plugin[];
    manifest?: PluginManifest;
}

export const importFromPath: ModuleImporter = (filePath) => import(pathToFileURL(filePath).href);

/**
 * Whether a path has the shape of a unit: a module file, or a directory with a manifest
 */
export async function isPluginUnit(target: string): Promise<boolean> {
    if (await isDirectory(target)) {
        return pathExists(path.join(target, MANIFEST_FILE));
    }
    return MODULE_EXTENSIONS.has(path.extname(target)) && pathExists(target);
}

/**
 * Plugin Loader — discovers loadable units in the plugin directory
 *
 * A unit is either a module file:
 *
 * ```
 * ~/.assistant/plugins/docker.mjs      export function createPlugins() { ... }
 * ```
 *
 * or a directory with a manifest pointing at its module:
 *
 * ```
 * ~/.assistant/plugins/k8s/plugin.json { "name": "k8s", "version": "1.0.0", "main": "index.js" }
 * ```
 *
 * Entries are visited in name order. A unit that fails to load is logged and
 * skipped; the rest of the directory is still loaded.
 */
export class PluginLoader {
    constructor(
        private readonly logger: Logger,
        private readonly importModule: ModuleImporter = importFromPath,
    ) {}

    /**
     * Load every unit in a directory
     */
    async discover(dirPath: string): Promise<LoadedUnit[]> {
        if (!(await pathExists(dirPath))) {
            this.logger.debug(`Plugin directory not found: ${dirPath}`);
            return [];
        }

        const entries = await readdir(dirPath, { withFileTypes: true });
        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        const units: LoadedUnit[] = [];
        for (const entry of entries) {
            const unitPath = path.join(dirPath, entry.name);

            try {
                const unit = entry.isDirectory()
                    ? await this.loadDirectoryUnit(unitPath)
                    : entry.isFile()
                        ? await this.loadFileUnit(unitPath)
                        : null;
                if (unit) units.push(unit);
            } catch (err) {
                this.logger.error(`Failed to load plugin unit ${unitPath}: ${errorMessage(err)}`);
            }
        }

        return units;
    }

    /**
     * Load a single module file; other file types are ignored
     */
    async loadFileUnit(filePath: string): Promise<LoadedUnit | null> {
        if (!MODULE_EXTENSIONS.has(path.extname(filePath))) return null;

        const plugins = await this.instantiate(await this.importModule(filePath), filePath);
        return plugins ? { path: filePath, plugins } : null;
    }

    /**
     * Load a directory unit through its plugin.json
     */
    async loadDirectoryUnit(unitDir: string): Promise<LoadedUnit | null> {
        const manifestPath = path.join(unitDir, MANIFEST_FILE);
        if (!(await pathExists(manifestPath))) {
            this.logger.debug(`Skipping ${unitDir}: no ${MANIFEST_FILE}`);
            return null;
        }

        const content = await readFile(manifestPath, 'utf-8');
        const parsed = PluginManifestSchema.safeParse(JSON.parse(content));
        if (!parsed.success) {
            const fields = parsed.error.issues.map(i => i.path.join('.')).join(', ');
            throw new Error(`Invalid plugin manifest at ${manifestPath}: check ${fields}`);
        }

        const manifest = parsed.data;
        if (manifest.enabled === false) {
            this.logger.info(`Plugin unit ${manifest.name} is disabled in its manifest`);
            return null;
        }

        const mainPath = path.resolve(unitDir, manifest.main);
        const plugins = await this.instantiate(await this.importModule(mainPath), unitDir);
        return plugins ? { path: unitDir, plugins, manifest } : null;
    }

    /**
     * Call the unit's factory and keep the values that look like plugins
     */
    private async instantiate(mod: unknown, unitPath: string): Promise<Plugin[] | null> {
        const factory = findFactory(mod);
        if (!factory) {
            this.logger.debug(`Skipping ${unitPath}: no ${FACTORY_EXPORT} export`);
            return null;
        }

        const produced: unknown = await Reflect.apply(factory, undefined, []);
        const candidates: unknown[] = Array.isArray(produced) ? produced : [produced];

        const plugins: Plugin[] = [];
        candidates.forEach((candidate, index) => {
            if (isPlugin(candidate)) {
                plugins.push(candidate);
            } else {
                this.logger.warn(`Ignoring value #${index} from ${unitPath}: not a plugin`);
            }
        });
        return plugins;
    }
}

/**
 * `createPlugins`, a default function, or `createPlugins` on a CommonJS default export
 */
function findFactory(mod: unknown): Function | null {
    if (typeof mod !== 'object' || mod === null) return null;

    const named: unknown = Reflect.get(mod, FACTORY_EXPORT);
    if (typeof named === 'function') return named;

    const fallback: unknown = Reflect.get(mod, 'default');
    if (typeof fallback === 'function') return fallback;
    if (typeof fallback === 'object' && fallback !== null) {
        const nested: unknown = Reflect.get(fallback, FACTORY_EXPORT);
        if (typeof nested === 'function') return nested;
    }

    return null;
}
