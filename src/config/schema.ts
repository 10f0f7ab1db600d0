import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';

/**
 * Assistant configuration — every key is optional in the file and
 * defaulted here, so a partial file merges over the defaults.
 */
export const AssistantConfigSchema = z.object({
    assistant: z.object({
        /** Executable that receives commands without a plugin namespace */
        primaryTool: z.string().min(1).default('claude'),
        primaryTimeoutSeconds: z.number().positive().default(300),
        /** Detect the project in the working directory on REPL start */
        autoContext: z.boolean().default(true),
        /** Keep the task ledger in .assistant/tasks.db instead of memory */
        taskPersistence: z.boolean().default(false),
    }).default({}),
    plugins: z.object({
        enabled: z.boolean().default(true),
        /** Directory scanned for external plugin units (default ~/.assistant/plugins) */
        directory: z.string().min(1).optional(),
        /** Plugin names that are never registered */
        disabled: z.array(z.string()).default([]),
    }).default({}),
    process: z.object({
        /** Default timeout for external tools when a handler sets none */
        timeoutSeconds: z.number().positive().default(30),
    }).default({}),
    logging: z.object({
        level: z.enum(LOG_LEVELS).default('info'),
        file: z.string().min(1).optional(),
    }).default({}),
});

export type AssistantConfig = z.infer<typeof AssistantConfigSchema>;
