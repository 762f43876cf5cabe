// tests/helpers.ts
import { vi } from 'vitest'
import type { FetchedFile, RepoContext, RepoSource } from '../src/github/types.js'
import type { AIProvider, ChatCompletion, ChatOptions, Message } from '../src/providers/types.js'

export const TOKENS = { promptTokens: 1000, completionTokens: 500, cachedPromptTokens: 0 }

/** Provider answering with the given texts in order, then '{}'. */
export function createMockProvider(responses: string[], model = 'gpt-4.1') {
  let callCount = 0
  const chat = vi.fn(async (_messages: Message[], _options?: ChatOptions): Promise<ChatCompletion> => ({
    text: responses[callCount++] ?? '{}',
    tokens: { ...TOKENS }
  }))
  const provider: AIProvider = { name: 'mock', model, chat }
  return { provider, chat }
}

export function createContext(overrides: Partial<RepoContext> = {}): RepoContext {
  return {
    repoUrl: 'https://github.com/acme/widget',
    owner: 'acme',
    repo: 'widget',
    fullName: 'acme/widget',
    description: 'A widget service',
    stars: 42,
    language: 'TypeScript',
    topics: ['http', 'widgets'],
    license: 'MIT',
    defaultBranch: 'main',
    ref: 'main',
    readme: '# Widget\nServes widgets.',
    treeSummary: '📄 README.md\n📁 src/\n📄 src/server.ts',
    treePaths: ['README.md', 'src/server.ts', 'src/db.ts', 'src/routes.ts', 'src/auth.ts', 'src/config.ts'],
    keyFiles: ['README.md', 'package.json'],
    keyFileContents: { 'README.md': '# Widget', 'package.json': '{}' },
    ...overrides
  }
}

/**
 * File behaviour per path: a string is the content, 'missing' is unavailable,
 * 'throw' rejects and 'hang' never settles. Unlisted paths are missing.
 */
export type FileBehaviour = string | { kind: 'missing' } | { kind: 'throw' } | { kind: 'hang' }

export function createSource(files: Record<string, FileBehaviour>, context: RepoContext = createContext()) {
  const fetchFile = vi.fn(async (_ctx: RepoContext, path: string): Promise<FetchedFile> => {
    const behaviour = files[path] ?? { kind: 'missing' }
    if (typeof behaviour === 'string') return { status: 'ok', path, content: behaviour }
    switch (behaviour.kind) {
      case 'missing':
        return { status: 'unavailable', path, reason: 'not found' }
      case 'throw':
        throw new Error(`boom: ${path}`)
      case 'hang':
        return new Promise<FetchedFile>(() => {})
    }
  })
  const fetchContext = vi.fn(async () => context)
  const source: RepoSource = { fetchContext, fetchFile }
  return { source, fetchFile, fetchContext }
}

export function overviewJson(paths: string[], summary = 'Overview summary'): string {
  return JSON.stringify({
    summary,
    open_questions: ['How is it deployed?'],
    candidate_files: paths.map(path => ({ path, reason: `read ${path}` }))
  })
}

export function deepDiveJson(summary: string, newPaths: string[] = []): string {
  return JSON.stringify({
    updated_summary: summary,
    open_questions: [],
    new_candidate_files: newPaths.map(path => ({ path, reason: `read ${path}` }))
  })
}
