/**
 * Plugin System — Types
 *
 * A plugin is a named, versioned capability unit exposing a map of command
 * names to handlers. Built-in plugins ship with the assistant; external ones
 * are discovered in the plugin directory.
 */

import { z } from 'zod';
import type { CommandMap } from '../commands/types.js';
import type { AssistantConfig } from '../config/schema.js';
import type { Logger } from '../logging/logger.js';
import type { Invoker } from '../process/types.js';

/**
 * Shared context handed to every plugin's `initialize`
 */
export interface PluginContext {
    logger: Logger;
    invoker: Invoker;
    /** Working directory commands operate on */
    cwd: string;
    config: AssistantConfig;
}

export interface Plugin {
    /** Unique plugin name, the command namespace */
    readonly name: string;
    /** Semver version */
    readonly version: string;
    readonly description: string;

    /**
     * Prepare the plugin. Returning false keeps it out of the registry.
     */
    initialize(context: PluginContext): boolean | Promise<boolean>;

    /**
     * Command map, read once right after a successful initialize
     */
    commands(): CommandMap;

    /**
     * Release resources at shutdown
     */
    cleanup?(): void | Promise<void>;
}

/**
 * Read-only view of a registered plugin
 */
export interface PluginDescriptor {
    name: string;
    version: string;
    description: string;
    /** Local command names, in declaration order */
    commands: string[];
    /** 'builtin' or the path of the unit it was loaded from */
    source: string;
}

/**
 * What a loadable unit exports: `createPlugins` or a default function
 */
export type PluginFactory = () => Plugin | Plugin[] | Promise<Plugin | Plugin[]>;

/**
 * Manifest of a directory unit (`<unit>/plugin.json`)
 */
export const PluginManifestSchema = z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    description: z.string().optional(),
    /** Module file, relative to the unit directory */
    main: z.string().min(1),
    enabled: z.boolean().optional(),
});

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

/**
 * Structural check for values coming from untyped external modules
 */
export function isPlugin(value: unknown): value is Plugin {
    if (typeof value !== 'object' || value === null) return false;
    return (
        typeof Reflect.get(value, 'name') === 'string' &&
        typeof Reflect.get(value, 'version') === 'string' &&
        typeof Reflect.get(value, 'description') === 'string' &&
        typeof Reflect.get(value, 'initialize') === 'function' &&
        typeof Reflect.get(value, 'commands') === 'function'
    );
}
