/**
 * Scaffolding templates for project-manager
 */

export const PROJECT_TYPES = ['python', 'javascript'] as const;

export type ProjectType = (typeof PROJECT_TYPES)[number];

export function isProjectType(value: string): value is ProjectType {
    return PROJECT_TYPES.some(type => type === value);
}

export interface Scaffold {
    directories: string[];
    /** Relative path → content */
    files: Record<string, string>;
}

export function scaffoldFor(type: ProjectType, name: string): Scaffold {
    switch (type) {
        case 'python':
            return {
                directories: ['src', 'tests', 'docs'],
                files: {
                    'README.md': `# ${name}\n\nA Python project.\n`,
                    'requirements.txt': '# Add your dependencies here\n',
                    '.gitignore': '__pycache__/\n*.pyc\n.venv/\ndist/\nbuild/\n',
                    'src/__init__.py': '',
                },
            };
        case 'javascript':
            return {
                directories: ['src', 'tests'],
                files: {
                    'package.json': JSON.stringify({
                        name,
                        version: '1.0.0',
                        description: 'A JavaScript project',
                        main: 'src/index.js',
                        scripts: {
                            start: 'node src/index.js',
                            test: 'echo "Error: no test specified" && exit 1',
                        },
                        dependencies: {},
                        devDependencies: {},
                    }, null, 2) + '\n',
                    'README.md': `# ${name}\n\nA JavaScript project.\n`,
                    '.gitignore': 'node_modules/\ndist/\nbuild/\n',
                    'src/index.js': "console.log('Hello, World!');\n",
                },
            };
    }
}

export type DetectedType = 'JavaScript/Node.js' | 'Python' | 'Java/Maven' | 'Unknown';

const INSTALL_SECTIONS: Partial<Record<DetectedType, string>> = {
    'Python': [
        '```bash',
        '# Create a virtual environment',
        'python -m venv .venv',
        '',
        '# Activate it',
        'source .venv/bin/activate  # Linux/macOS',
        '.venv\\Scripts\\activate     # Windows',
        '',
        '# Install dependencies',
        'pip install -r requirements.txt',
        '```',
    ].join('\n'),
    'JavaScript/Node.js': [
        '```bash',
        'npm install',
        '```',
    ].join('\n'),
    'Java/Maven': [
        '```bash',
        'mvn install',
        '```',
    ].join('\n'),
};

export function renderReadme(name: string, type: DetectedType): string {
    const article = type === 'Unknown' ? 'An' : 'A';
    const lines = [
        `# ${name}`,
        '',
        `${article} ${type} project.`,
        '',
        '## Description',
        '',
        'Add your project description here.',
        '',
        '## Installation',
        '',
        INSTALL_SECTIONS[type] ?? 'Add installation instructions here.',
        '',
        '## Usage',
        '',
        'Add usage instructions here.',
        '',
        '## Contributing',
        '',
        '1. Fork the project',
        '2. Create your feature branch (`git checkout -b feature/my-feature`)',
        "3. Commit your changes (`git commit -m 'Add my feature'`)",
        '4. Push to the branch (`git push origin feature/my-feature`)',
        '5. Open a Pull Request',
        '',
        '## License',
        '',
        'Add license information here.',
        '',
    ];
    return lines.join('\n');
}
