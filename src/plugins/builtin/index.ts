import type { BuiltinFactory } from './base.js';
import { CodeAnalyzerPlugin } from './code-analyzer.js';
import { GitHubPlugin } from './github.js';
import { GoogleCloudPlugin } from './google-cloud.js';
import { ProjectManagerPlugin } from './project-manager.js';

export type { BuiltinFactory } from './base.js';
export { BuiltinPlugin } from './base.js';
export { CodeAnalyzerPlugin } from './code-analyzer.js';
export { GitHubPlugin } from './github.js';
export { GoogleCloudPlugin } from './google-cloud.js';
export { ProjectManagerPlugin } from './project-manager.js';

/**
 * Built-in plugins, in registration order
 */
export const BUILTIN_PLUGINS: readonly BuiltinFactory[] = [
    () => new CodeAnalyzerPlugin(),
    () => new ProjectManagerPlugin(),
    () => new GoogleCloudPlugin(),
    () => new GitHubPlugin(),
];
