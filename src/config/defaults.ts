import { AssistantConfigSchema, type AssistantConfig } from './schema.js';

export const DEFAULT_CONFIG: AssistantConfig = AssistantConfigSchema.parse({});

/**
 * File names looked up, in order, inside each config directory
 */
export const CONFIG_FILE_NAMES = ['config.yaml', 'config.yml', 'config.json'];
