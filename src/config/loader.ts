import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { AssistantConfigSchema, type AssistantConfig } from './schema.js';
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, errorMessage } from '../errors.js';
import { pathExists } from '../utils/fs.js';
import { getAssistantDir, getProjectDir, resolveUserPath } from '../utils/paths.js';

export interface ConfigLoaderOptions {
    cwd?: string;
    home?: string;
}

/**
 * Config Loader — finds, parses and validates the assistant configuration
 *
 * Lookup order when no explicit path is given:
 * 1. `<cwd>/.assistant/config.{yaml,yml,json}`
 * 2. `~/.assistant/config.{yaml,yml,json}`
 *
 * No file at all means defaults.
 */
export class ConfigLoader {
    private readonly cwd: string;
    private readonly home: string;
    private loadedFrom: string | null = null;

    constructor(options: ConfigLoaderOptions = {}) {
        this.cwd = options.cwd ?? process.cwd();
        this.home = options.home ?? os.homedir();
    }

    /**
     * Load configuration, from `explicitPath` if given
     */
    async load(explicitPath?: string): Promise<AssistantConfig> {
        this.loadedFrom = null;

        if (explicitPath) {
            const resolved = resolveUserPath(explicitPath, this.cwd, this.home);
            if (!(await pathExists(resolved))) {
                throw new ConfigError(`Config file not found: ${resolved}`);
            }
            return this.loadFile(resolved);
        }

        for (const candidate of this.candidatePaths()) {
            if (await pathExists(candidate)) {
                return this.loadFile(candidate);
            }
        }

        return DEFAULT_CONFIG;
    }

    /**
     * Path of the file the last `load()` read, or null when defaults were used
     */
    get source(): string | null {
        return this.loadedFrom;
    }

    candidatePaths(): string[] {
        const dirs = [getProjectDir(this.cwd), getAssistantDir(this.home)];
        return dirs.flatMap(dir => CONFIG_FILE_NAMES.map(name => path.join(dir, name)));
    }

    /**
     * Validate an already-parsed config object
     */
    parse(raw: unknown, origin = 'config'): AssistantConfig {
        const result = AssistantConfigSchema.safeParse(raw ?? {});
        if (!result.success) {
            const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
            throw new ConfigError(`Invalid configuration in ${origin}: ${issues.join('; ')}`, issues);
        }
        return result.data;
    }

    private async loadFile(filePath: string): Promise<AssistantConfig> {
        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (err) {
            throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(err)}`);
        }

        let raw: unknown;
        try {
            raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
        } catch (err) {
            throw new ConfigError(`Cannot parse config file ${filePath}: ${errorMessage(err)}`);
        }

        const config = this.parse(raw, filePath);
        this.loadedFrom = filePath;
        return config;
    }
}

