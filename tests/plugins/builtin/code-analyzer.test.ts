import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CodeAnalyzerPlugin, countLines } from '../../../src/plugins/builtin/code-analyzer.js';
import { makeTempDir, pluginContext, removeDir } from '../../fixtures/context.js';

async function put(root: string, file: string, content: string): Promise<void> {
    const target = join(root, file);
    await mkdir(join(target, '..'), { recursive: true });
    await writeFile(target, content);
}

describe('CodeAnalyzerPlugin', () => {
    let dir: string;
    let plugin: CodeAnalyzerPlugin;

    beforeEach(async () => {
        dir = await makeTempDir();
        plugin = new CodeAnalyzerPlugin();
        await plugin.initialize(pluginContext({ cwd: dir }));
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('exposes the three analysis commands', () => {
        expect(Object.keys(plugin.commands())).toEqual(['analyze-complexity', 'analyze-dependencies', 'analyze-security']);
    });

    describe('analyze-complexity', () => {
        it('counts source files and lines per extension', async () => {
            await put(dir, 'src/app.py', 'import os\nprint(os.name)\n');
            await put(dir, 'src/util.js', 'const a = 1;\nconst b = 2;\n');
            await put(dir, 'README.md', '# readme\n');
            await put(dir, 'node_modules/lib/index.js', 'module.exports = 1;\n');

            const result = await plugin.analyzeComplexity();

            expect(result).toEqual({
                success: true,
                error: null,
                command: 'code-analyzer:analyze-complexity',
                output: {
                    path: dir,
                    totalFiles: 2,
                    totalLines: 4,
                    languages: {
                        '.py': { files: 1, lines: 2 },
                        '.js': { files: 1, lines: 2 },
                    },
                    complexityScore: 0.02,
                },
            });
        });

        it('scores an empty tree as zero', async () => {
            const result = await plugin.analyzeComplexity('.');

            expect(result.output).toEqual({ path: dir, totalFiles: 0, totalLines: 0, languages: {}, complexityScore: 0 });
        });

        it('fails for a missing path', async () => {
            const result = await plugin.analyzeComplexity('nope');

            expect(result).toEqual({
                success: false,
                output: null,
                error: 'Path not found: nope',
                command: 'code-analyzer:analyze-complexity',
            });
        });
    });

    describe('analyze-dependencies', () => {
        it('reads npm and pip manifests', async () => {
            await put(dir, 'package.json', JSON.stringify({ dependencies: { express: '^4.0.0' }, devDependencies: { vitest: '^2.0.0' } }));
            await put(dir, 'requirements.txt', 'flask==2.0\n# pinned below\nrequests>=2\n');

            const result = await plugin.analyzeDependencies();

            expect(result.output).toEqual({
                path: dir,
                packageManagers: ['npm', 'pip'],
                dependencies: {
                    npm: { production: ['express'], development: ['vitest'] },
                    pip: { production: ['flask', 'requests'] },
                },
            });
        });

        it('reports no package managers for a bare directory', async () => {
            const result = await plugin.analyzeDependencies();

            expect(result.output).toEqual({ path: dir, packageManagers: [], dependencies: {} });
        });

        it('fails on an unparsable package.json', async () => {
            await put(dir, 'package.json', '{ not json');

            const result = await plugin.analyzeDependencies();

            expect(result.success).toBe(false);
            expect(result.error?.startsWith('Cannot parse package.json: ')).toBe(true);
        });
    });

    describe('analyze-security', () => {
        it('reports each finding with file and line', async () => {
            await put(dir, 'src/client.js', 'const apiKey = "placeholder";\nexecute(task);\n');
            await put(dir, 'src/config.py', 'import os\npassword = "test-secret"\nresult = eval(expr)\n');
            await put(dir, 'node_modules/dep/index.js', 'eval(code)\n');

            const result = await plugin.analyzeSecurity();

            expect(result.output).toEqual({
                path: dir,
                issuesFound: 3,
                issues: [
                    { file: 'src/client.js', line: 1, type: 'potential_hardcoded_api_key', severity: 'high' },
                    { file: 'src/config.py', line: 2, type: 'potential_hardcoded_password', severity: 'high' },
                    { file: 'src/config.py', line: 3, type: 'dangerous_function_usage', severity: 'medium' },
                ],
                riskLevel: 'high',
            });
        });

        it('rates medium-only findings as medium risk', async () => {
            await put(dir, 'run.py', 'exec (source)\n');

            const result = await plugin.analyzeSecurity();

            expect(result.output).toEqual({
                path: dir,
                issuesFound: 1,
                issues: [{ file: 'run.py', line: 1, type: 'dangerous_function_usage', severity: 'medium' }],
                riskLevel: 'medium',
            });
        });

        it('rates a clean tree as low risk', async () => {
            await put(dir, 'main.go', 'package main\n');

            const result = await plugin.analyzeSecurity();

            expect(result.output).toEqual({ path: dir, issuesFound: 0, issues: [], riskLevel: 'low' });
        });
    });
});

describe('countLines', () => {
    it('does not count a trailing newline as a line', () => {
        expect(countLines('')).toBe(0);
        expect(countLines('one')).toBe(1);
        expect(countLines('one\n')).toBe(1);
        expect(countLines('one\ntwo')).toBe(2);
        expect(countLines('one\n\nthree\n')).toBe(3);
    });
});
