import { readdir } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { pathExists, readOptional } from '../utils/fs.js';

export interface ProjectContext {
    path: string;
    name: string;
    language: string | null;
    framework: string | null;
    packageManager: string | null;
    gitRepo: boolean;
    dependencies: string[];
}

/** First language with a matching top-level entry wins */
const LANGUAGE_INDICATORS: [string, string[]][] = [
    ['python', ['*.py', 'requirements.txt', 'pyproject.toml']],
    ['typescript', ['*.ts', 'tsconfig.json']],
    ['javascript', ['*.js', 'package.json']],
    ['java', ['*.java', 'pom.xml', 'build.gradle']],
    ['go', ['*.go', 'go.mod']],
    ['rust', ['*.rs', 'Cargo.toml']],
    ['cpp', ['*.cpp', '*.hpp', 'CMakeLists.txt']],
];

/** Lock files before manifests, so yarn and pnpm projects are not reported as npm */
const PACKAGE_MANAGERS: [string, string][] = [
    ['yarn', 'yarn.lock'],
    ['pnpm', 'pnpm-lock.yaml'],
    ['npm', 'package.json'],
    ['poetry', 'poetry.lock'],
    ['pip', 'requirements.txt'],
    ['maven', 'pom.xml'],
    ['gradle', 'build.gradle'],
    ['go', 'go.mod'],
    ['cargo', 'Cargo.toml'],
];

/** npm package → framework */
const NODE_FRAMEWORKS: [string, string][] = [
    ['next', 'next'],
    ['react', 'react'],
    ['vue', 'vue'],
    ['@angular/core', 'angular'],
    ['@nestjs/core', 'nest'],
    ['express', 'express'],
];

/** pip package → framework */
const PYTHON_FRAMEWORKS: [string, string][] = [
    ['django', 'django'],
    ['flask', 'flask'],
    ['fastapi', 'fastapi'],
];

const PackageJsonSchema = z.object({
    dependencies: z.record(z.string()).optional(),
    devDependencies: z.record(z.string()).optional(),
});

/**
 * Describe the project rooted at `dir`; only top-level entries are inspected
 */
export async function detectProjectContext(dir: string = process.cwd()): Promise<ProjectContext> {
    const root = path.resolve(dir);
    const entries = await readdir(root).catch((): string[] => []);

    const has = (name: string) => entries.includes(name);
    const matches = (pattern: string) => pattern.startsWith('*.')
        ? entries.some(entry => entry.endsWith(pattern.slice(1)))
        : has(pattern);

    const language = LANGUAGE_INDICATORS.find(([, patterns]) => patterns.some(matches))?.[0] ?? null;
    const packageManager = PACKAGE_MANAGERS.find(([, file]) => has(file))?.[0] ?? null;

    const nodeDeps = await readNodeDependencies(root);
    const requirements = await readOptional(path.join(root, 'requirements.txt'));
    const pythonDeps = requirements === null ? [] : parseRequirements(requirements);

    return {
        path: root,
        name: path.basename(root),
        language,
        framework: detectFramework(entries, nodeDeps, pythonDeps),
        packageManager,
        gitRepo: await pathExists(path.join(root, '.git')),
        dependencies: [...pythonDeps, ...nodeDeps],
    };
}

function detectFramework(entries: string[], nodeDeps: string[], pythonDeps: string[]): string | null {
    const python = pythonDeps.map(dep => dep.toLowerCase());
    for (const [pkg, framework] of PYTHON_FRAMEWORKS) {
        if (python.includes(pkg)) return framework;
    }
    if (entries.includes('manage.py')) return 'django';

    for (const [pkg, framework] of NODE_FRAMEWORKS) {
        if (nodeDeps.includes(pkg)) return framework;
    }

    if (entries.includes('pom.xml') && entries.includes('application.properties')) return 'spring';
    return null;
}

async function readNodeDependencies(root: string): Promise<string[]> {
    const content = await readOptional(path.join(root, 'package.json'));
    if (content === null) return [];

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch {
        return [];
    }
    const parsed = PackageJsonSchema.safeParse(raw);
    if (!parsed.success) return [];
    return [
        ...Object.keys(parsed.data.dependencies ?? {}),
        ...Object.keys(parsed.data.devDependencies ?? {}),
    ];
}

/**
 * Package names from a requirements.txt, without versions or markers
 */
export function parseRequirements(content: string): string[] {
    return content
        .split('\n')
        .map(line => line.trim())
        .filter(line => line !== '' && !line.startsWith('#') && !line.startsWith('-'))
        .map(line => line.split(/[=<>!~;[\s]/)[0] ?? line)
        .filter(name => name !== '');
}
