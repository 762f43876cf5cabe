// src/repo-scanner/types.ts
export interface TreeSummaryOptions {
  maxEntries: number
  ignore?: string[]
}

export const DEFAULT_IGNORE = [
  'node_modules',
  '.git',
  '.venv',
  'venv',
  'dist',
  'build',
  '__pycache__'
]

// Root-level files worth sampling first, in priority order
export const WELL_KNOWN_FILES = [
  'README.md',
  'README.rst',
  'README.txt',
  'CONTRIBUTING.md',
  'LICENSE',
  'SECURITY.md',
  'CHANGELOG.md',
  'CODEOWNERS',
  '.env.example',
  '.env.sample',
  'Dockerfile',
  'docker-compose.yml',
  'compose.yml',
  'Makefile',
  'pyproject.toml',
  'requirements.txt',
  'Pipfile',
  'setup.py',
  'package.json',
  'tsconfig.json',
  'Cargo.toml',
  'go.mod',
  'pom.xml',
  'build.gradle'
]

export const ENTRYPOINT_SUFFIXES = [
  '/main.py',
  '/app.py',
  '/server.py',
  '/cli.py',
  '/index.js',
  '/index.ts',
  '/main.ts',
  '/main.go',
  '/main.rs',
  '/__init__.py'
]
