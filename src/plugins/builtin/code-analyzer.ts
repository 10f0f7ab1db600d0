import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { fail, ok } from '../../commands/result.js';
import type { CommandMap, CommandResult } from '../../commands/types.js';
import { errorMessage } from '../../errors.js';
import { parseRequirements } from '../../project/context.js';
import { isDirectory, readOptional } from '../../utils/fs.js';
import { BuiltinPlugin } from './base.js';

/** Directory and file names never descended into */
const IGNORED = new Set(['.git', 'node_modules', '__pycache__', '.venv', 'venv', 'dist', 'build', '.pytest_cache']);

const SOURCE_EXTENSIONS = new Set(['.py', '.js', '.ts', '.java', '.cpp', '.go']);

type Severity = 'high' | 'medium';

interface SecurityRule {
    type: string;
    severity: Severity;
    pattern: RegExp;
}

const SECURITY_RULES: SecurityRule[] = [
    {
        type: 'potential_hardcoded_password',
        severity: 'high',
        pattern: /(?:password|passwd)\w*\s*[:=]\s*["'][^"'\s]+["']/i,
    },
    {
        type: 'potential_hardcoded_api_key',
        severity: 'high',
        pattern: /api[_-]?key\w*\s*[:=]\s*["'][^"'\s]+["']/i,
    },
    {
        type: 'dangerous_function_usage',
        severity: 'medium',
        pattern: /\b(?:eval|exec)\s*\(/,
    },
];

export interface SecurityIssue {
    /** Path relative to the analyzed directory, `/`-separated */
    file: string;
    line: number;
    type: string;
    severity: Severity;
}

export interface LanguageStats {
    files: number;
    lines: number;
}

const PackageJsonSchema = z.object({
    dependencies: z.record(z.string()).optional(),
    devDependencies: z.record(z.string()).optional(),
});

/**
 * Code Analyzer — filesystem-only metrics over a project tree
 */
export class CodeAnalyzerPlugin extends BuiltinPlugin {
    readonly name = 'code-analyzer';
    readonly version = '1.0.0';
    readonly description = 'Code complexity, dependency and security analysis';

    commands(): CommandMap {
        return {
            'analyze-complexity': (args) => this.analyzeComplexity(args[0]),
            'analyze-dependencies': (args) => this.analyzeDependencies(args[0]),
            'analyze-security': (args) => this.analyzeSecurity(args[0]),
        };
    }

    async analyzeComplexity(target = '.'): Promise<CommandResult> {
        const command = this.label('analyze-complexity');
        const root = this.resolvePath(target);
        if (!(await isDirectory(root))) return fail(command, `Path not found: ${target}`);

        const languages: Record<string, LanguageStats> = {};
        let totalFiles = 0;
        let totalLines = 0;

        for await (const file of walk(root)) {
            const ext = path.extname(file).toLowerCase();
            if (!SOURCE_EXTENSIONS.has(ext)) continue;

            const content = await this.readSource(root, file);
            if (content === null) continue;

            const lines = countLines(content);
            totalFiles++;
            totalLines += lines;
            const stats = languages[ext] ?? (languages[ext] = { files: 0, lines: 0 });
            stats.files++;
            stats.lines += lines;
        }

        const complexityScore = totalFiles > 0
            ? Math.round(Math.min(10, totalLines / totalFiles / 100) * 100) / 100
            : 0;

        return ok(command, { path: root, totalFiles, totalLines, languages, complexityScore });
    }

    async analyzeDependencies(target = '.'): Promise<CommandResult> {
        const command = this.label('analyze-dependencies');
        const root = this.resolvePath(target);
        if (!(await isDirectory(root))) return fail(command, `Path not found: ${target}`);

        const packageManagers: string[] = [];
        const dependencies: Record<string, { production: string[]; development?: string[] }> = {};

        const packageJson = await readOptional(path.join(root, 'package.json'));
        if (packageJson !== null) {
            let raw: unknown;
            try {
                raw = JSON.parse(packageJson);
            } catch (err) {
                return fail(command, `Cannot parse package.json: ${errorMessage(err)}`);
            }
            const parsed = PackageJsonSchema.safeParse(raw);
            if (!parsed.success) {
                return fail(command, 'package.json has an unexpected dependencies layout');
            }
            packageManagers.push('npm');
            dependencies.npm = {
                production: Object.keys(parsed.data.dependencies ?? {}),
                development: Object.keys(parsed.data.devDependencies ?? {}),
            };
        }

        const requirements = await readOptional(path.join(root, 'requirements.txt'));
        if (requirements !== null) {
            packageManagers.push('pip');
            dependencies.pip = { production: parseRequirements(requirements) };
        }

        return ok(command, { path: root, packageManagers, dependencies });
    }

    async analyzeSecurity(target = '.'): Promise<CommandResult> {
        const command = this.label('analyze-security');
        const root = this.resolvePath(target);
        if (!(await isDirectory(root))) return fail(command, `Path not found: ${target}`);

        const issues: SecurityIssue[] = [];
        for await (const file of walk(root)) {
            if (!SOURCE_EXTENSIONS.has(path.extname(file).toLowerCase())) continue;

            const content = await this.readSource(root, file);
            if (content === null) continue;

            content.split('\n').forEach((text, index) => {
                for (const rule of SECURITY_RULES) {
                    if (rule.pattern.test(text)) {
                        issues.push({
                            file: file.split(path.sep).join('/'),
                            line: index + 1,
                            type: rule.type,
                            severity: rule.severity,
                        });
                    }
                }
            });
        }

        const riskLevel = issues.some(i => i.severity === 'high')
            ? 'high'
            : issues.length > 0 ? 'medium' : 'low';

        return ok(command, { path: root, issuesFound: issues.length, issues, riskLevel });
    }

    private async readSource(root: string, file: string): Promise<string | null> {
        try {
            return await readFile(path.join(root, file), 'utf-8');
        } catch (err) {
            this.context.logger.debug(`Skipping unreadable file ${file}: ${errorMessage(err)}`);
            return null;
        }
    }
}

/**
 * Files under `root`, relative to it, in name order
 */
async function* walk(root: string, relDir = ''): AsyncGenerator<string> {
    const entries = await readdir(path.join(root, relDir), { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
        if (IGNORED.has(entry.name)) continue;
        const relPath = relDir ? path.join(relDir, entry.name) : entry.name;
        if (entry.isDirectory()) {
            yield* walk(root, relPath);
        } else if (entry.isFile()) {
            yield relPath;
        }
    }
}

/**
 * Line count as an editor shows it; a trailing newline adds no line
 */
export function countLines(content: string): number {
    if (content === '') return 0;
    const lines = content.split('\n').length;
    return content.endsWith('\n') ? lines - 1 : lines;
}
