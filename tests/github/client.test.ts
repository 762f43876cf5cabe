// tests/github/client.test.ts
import { describe, it, expect, vi, afterEach } from 'vitest'
import { GitHubClient, parseGitHubRepoUrl } from '../../src/github/client.js'
import { ConfigurationError, GitHubError } from '../../src/errors.js'
import { createContext } from '../helpers.js'

const API = 'https://api.github.com'

type Route = { status?: number; body?: unknown; headers?: Record<string, string> }

function json(route: Route): Response {
  return new Response(JSON.stringify(route.body ?? {}), {
    status: route.status ?? 200,
    headers: { 'content-type': 'application/json', ...route.headers }
  })
}

const b64 = (text: string) => Buffer.from(text, 'utf-8').toString('base64')

/** Stub global fetch with a path → route table; a route list is served in order. */
function stubFetch(routes: Record<string, Route | Route[]>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const path = String(input).slice(API.length)
    const route = routes[path]
    if (route === undefined) return json({ status: 404, body: { message: 'Not Found' } })
    if (Array.isArray(route)) {
      const next = route.shift()
      return json(next ?? { status: 500 })
    }
    return json(route)
  })
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

const noSleep = () => vi.fn(async (_ms: number) => {})

describe('parseGitHubRepoUrl', () => {
  it('should accept owner/repo URLs with optional .git and slash', () => {
    expect(parseGitHubRepoUrl('https://github.com/acme/widget')).toEqual({ owner: 'acme', repo: 'widget' })
    expect(parseGitHubRepoUrl('https://github.com/acme/widget.git')).toEqual({ owner: 'acme', repo: 'widget' })
    expect(parseGitHubRepoUrl(' https://github.com/acme/widget/ ')).toEqual({ owner: 'acme', repo: 'widget' })
  })

  it('should reject anything else', () => {
    expect(() => parseGitHubRepoUrl('https://gitlab.com/acme/widget')).toThrow(ConfigurationError)
    expect(() => parseGitHubRepoUrl('https://github.com/acme')).toThrow('Expected https://github.com/OWNER/REPO')
    expect(() => parseGitHubRepoUrl('https://github.com/acme/widget/tree/main')).toThrow(ConfigurationError)
  })
})

describe('GitHubClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should build a repository context', async () => {
    const fetchMock = stubFetch({
      '/repos/acme/widget': {
        body: {
          full_name: 'acme/widget',
          default_branch: 'main',
          description: 'Widgets',
          stargazers_count: 5,
          language: 'TypeScript',
          topics: ['http'],
          license: { spdx_id: 'MIT' }
        }
      },
      '/repos/acme/widget/branches/main': { body: { commit: { commit: { tree: { sha: 't1' } } } } },
      '/repos/acme/widget/git/trees/t1?recursive=1': {
        body: {
          tree: [
            { path: 'README.md', type: 'blob', size: 10 },
            { path: 'src', type: 'tree' },
            { path: 'src/index.ts', type: 'blob', size: 9 }
          ]
        }
      },
      '/repos/acme/widget/contents/README.md?ref=main': { body: { type: 'file', content: b64('# Widget\nhello') } },
      '/repos/acme/widget/contents/src/index.ts?ref=main': { body: { type: 'file', content: b64('export {}') } }
    })
    const client = new GitHubClient({ token: 'test-token', sleep: noSleep() })

    const context = await client.fetchContext('https://github.com/acme/widget', {
      maxReadmeChars: 1000,
      maxTreeEntries: 10,
      maxKeyFiles: 5,
      maxFileChars: 1000
    })

    expect(context).toMatchObject({
      owner: 'acme',
      repo: 'widget',
      fullName: 'acme/widget',
      description: 'Widgets',
      stars: 5,
      language: 'TypeScript',
      topics: ['http'],
      license: 'MIT',
      defaultBranch: 'main',
      ref: 'main',
      readme: '# Widget\nhello',
      treeSummary: '📄 README.md\n📁 src/\n📄 src/index.ts',
      treePaths: ['README.md', 'src/index.ts'],
      keyFiles: ['README.md', 'src/index.ts'],
      keyFileContents: { 'README.md': '# Widget\nhello', 'src/index.ts': 'export {}' }
    })
    expect(Object.isFrozen(context)).toBe(true)
    const init = fetchMock.mock.calls[0][1]
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token', 'X-GitHub-Api-Version': '2022-11-28' })
  })

  it('should retry server errors with exponential backoff', async () => {
    stubFetch({ '/repos/acme/widget': [{ status: 503 }, { status: 502 }, { body: { ok: true } }] })
    const sleep = noSleep()
    const client = new GitHubClient({ sleep })

    await expect(client.getJson('/repos/acme/widget')).resolves.toEqual({ ok: true })
    expect(sleep.mock.calls).toEqual([[500], [1000]])
  })

  it('should honour Retry-After on 429, capped at ten seconds', async () => {
    stubFetch({ '/x': [{ status: 429, headers: { 'retry-after': '30' } }, { body: [] }] })
    const sleep = noSleep()

    await new GitHubClient({ sleep }).getJson('/x')

    expect(sleep.mock.calls).toEqual([[10000]])
  })

  it('should give up after three retries on network errors', async () => {
    const fetchMock = vi.fn(async () => {
      throw new TypeError('fetch failed')
    })
    vi.stubGlobal('fetch', fetchMock)
    const sleep = noSleep()

    const error = await new GitHubClient({ sleep }).getJson('/x').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(GitHubError)
    expect(error).toMatchObject({ status: 0, message: `GitHub API request failed for ${API}/x: fetch failed` })
    expect(fetchMock).toHaveBeenCalledTimes(4)
    expect(sleep.mock.calls).toEqual([[500], [1000], [2000]])
  })

  it('should return null for 404', async () => {
    stubFetch({})
    await expect(new GitHubClient({ sleep: noSleep() }).getJson('/missing')).resolves.toBeNull()
  })

  it('should report exhausted rate limits', async () => {
    stubFetch({ '/x': { status: 403, headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '0' } } })

    const error = await new GitHubClient({ sleep: noSleep() }).getJson('/x').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(GitHubError)
    expect(error).toMatchObject({
      status: 403,
      message: `GitHub API rate limit exceeded while requesting ${API}/x. Set GITHUB_TOKEN to raise your limits. Reset time: 1970-01-01T00:00:00.000Z.`
    })
  })

  it('should fail on a missing repository', async () => {
    stubFetch({})
    await expect(
      new GitHubClient({ sleep: noSleep() }).fetchContext('https://github.com/acme/nope', {
        maxReadmeChars: 10,
        maxTreeEntries: 10,
        maxKeyFiles: 1,
        maxFileChars: 10
      })
    ).rejects.toThrow('Repository acme/nope not found or is private.')
  })

  describe('fetchFile', () => {
    const context = createContext()

    it('should return truncated text content', async () => {
      stubFetch({ '/repos/acme/widget/contents/src/app.ts?ref=main': { body: { type: 'file', content: b64('x'.repeat(100)) } } })

      const file = await new GitHubClient({ sleep: noSleep() }).fetchFile(context, './src/app.ts', { maxChars: 30 })

      expect(file.status).toBe('ok')
      if (file.status === 'ok') {
        expect(file.path).toBe('src/app.ts')
        expect(file.content).toBe('x'.repeat(12) + '\n...[truncated]...')
      }
    })

    it('should mark missing files and directories unavailable', async () => {
      stubFetch({ '/repos/acme/widget/contents/src?ref=main': { body: [{ name: 'a.ts' }] } })
      const client = new GitHubClient({ sleep: noSleep() })

      expect(await client.fetchFile(context, 'src/gone.ts')).toEqual({ status: 'unavailable', path: 'src/gone.ts', reason: 'not found' })
      expect(await client.fetchFile(context, 'src')).toEqual({ status: 'unavailable', path: 'src', reason: 'not a file' })
    })

    it('should not fetch binary or invalid paths', async () => {
      const fetchMock = stubFetch({})
      const client = new GitHubClient({ sleep: noSleep() })

      expect(await client.fetchFile(context, 'assets/logo.png')).toEqual({ status: 'unavailable', path: 'assets/logo.png', reason: 'binary file' })
      expect(await client.fetchFile(context, '../etc/passwd')).toEqual({ status: 'unavailable', path: '../etc/passwd', reason: 'invalid path' })
      expect(fetchMock).not.toHaveBeenCalled()
    })
  })
})
