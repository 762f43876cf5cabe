// src/github/client.ts
import { ConfigurationError, GitHubError } from '../errors.js'
import { isBinaryPath, normalizePath } from '../repo-scanner/filter.js'
import { pickKeyFiles } from '../repo-scanner/key-files.js'
import { blobPaths, buildTreeSummary, truncate } from '../repo-scanner/tree.js'
import type { ContextLimits, FetchedFile, RepoContext, RepoSource, TreeEntry } from './types.js'

const GITHUB_API = 'https://api.github.com'
const MAX_RETRIES = 3
const BACKOFF_BASE_MS = 500
const MAX_RETRY_AFTER_MS = 10_000

export interface GitHubClientOptions {
  token?: string
  timeoutMs?: number
  userAgent?: string
  baseUrl?: string
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>
}

export interface ParsedRepoUrl {
  owner: string
  repo: string
}

export function parseGitHubRepoUrl(repoUrl: string): ParsedRepoUrl {
  const match = repoUrl.trim().match(/^https?:\/\/github\.com\/([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/)
  if (!match) {
    throw new ConfigurationError(`Invalid repository URL "${repoUrl}". Expected https://github.com/OWNER/REPO`)
  }
  return { owner: match[1], repo: match[2] }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function str(value: unknown): string | null {
  return typeof value === 'string' ? value : null
}

function shouldRetryStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599)
}

function retryAfterMs(header: string | null): number | undefined {
  if (header === null) return undefined
  const seconds = Number(header)
  if (!Number.isFinite(seconds)) return undefined
  return Math.min(Math.max(0, seconds * 1000), MAX_RETRY_AFTER_MS)
}

function rateLimitError(url: string, res: Response): GitHubError {
  const reset = res.headers.get('x-ratelimit-reset')
  let hint = ''
  if (reset && Number.isFinite(Number(reset))) {
    hint = ` Reset time: ${new Date(Number(reset) * 1000).toISOString()}.`
  }
  return new GitHubError(
    `GitHub API rate limit exceeded while requesting ${url}. Set GITHUB_TOKEN to raise your limits.${hint}`,
    res.status
  )
}

function decodeBase64(content: string): string {
  return Buffer.from(content.replace(/\n/g, ''), 'base64').toString('utf-8')
}

function looksBinary(content: string): boolean {
  return content.includes('\u0000')
}

export class GitHubClient implements RepoSource {
  private token?: string
  private timeoutMs: number
  private userAgent: string
  private baseUrl: string
  private sleep: (ms: number) => Promise<void>

  constructor(options: GitHubClientOptions = {}) {
    this.token = options.token
    this.timeoutMs = options.timeoutMs ?? 25_000
    this.userAgent = options.userAgent ?? 'repo-brief'
    this.baseUrl = options.baseUrl ?? GITHUB_API
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'User-Agent': this.userAgent,
      'X-GitHub-Api-Version': '2022-11-28'
    }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }
    return headers
  }

  /**
   * GET a JSON document with bounded retries for 429, 5xx and network errors.
   * Returns null for 404 so callers can treat a missing file as unavailable.
   */
  async getJson(path: string, signal?: AbortSignal): Promise<unknown | null> {
    const url = `${this.baseUrl}${path}`
    let lastError: unknown

    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
      const timeout = AbortSignal.timeout(this.timeoutMs)
      let res: Response
      try {
        res = await fetch(url, {
          headers: this.headers(),
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout
        })
      } catch (error) {
        if (signal?.aborted) throw error
        lastError = error
        if (attempt < MAX_RETRIES) {
          await this.sleep(BACKOFF_BASE_MS * 2 ** attempt)
          continue
        }
        break
      }

      if (res.status === 404) return null
      if (res.status === 403 && res.headers.get('x-ratelimit-remaining') === '0') {
        throw rateLimitError(url, res)
      }
      if (shouldRetryStatus(res.status) && attempt < MAX_RETRIES) {
        const retryAfter = res.status === 429 ? retryAfterMs(res.headers.get('retry-after')) : undefined
        await this.sleep(retryAfter ?? BACKOFF_BASE_MS * 2 ** attempt)
        lastError = new GitHubError(`GitHub API error ${res.status}`, res.status)
        continue
      }
      if (!res.ok) {
        const body = await res.text().catch(() => '')
        throw new GitHubError(`GitHub API request failed for ${url}: ${res.status} ${body.slice(0, 200)}`, res.status)
      }

      try {
        return await res.json()
      } catch {
        throw new GitHubError(`GitHub API returned non-JSON response (status ${res.status}) for ${url}`, res.status)
      }
    }

    const detail = lastError instanceof Error ? lastError.message : String(lastError)
    throw new GitHubError(`GitHub API request failed for ${url}: ${detail}`, 0)
  }

  async fetchTree(owner: string, repo: string, ref: string): Promise<TreeEntry[]> {
    const encodedRef = encodeURIComponent(ref)
    let treeSha: string | null = null

    const branch = await this.getJson(`/repos/${owner}/${repo}/branches/${encodedRef}`)
    if (isRecord(branch) && isRecord(branch.commit) && isRecord(branch.commit.commit) && isRecord(branch.commit.commit.tree)) {
      treeSha = str(branch.commit.commit.tree.sha)
    }
    if (!treeSha) {
      // Tags and commit SHAs resolve through the commits endpoint
      const commit = await this.getJson(`/repos/${owner}/${repo}/commits/${encodedRef}`)
      if (isRecord(commit) && isRecord(commit.commit) && isRecord(commit.commit.tree)) {
        treeSha = str(commit.commit.tree.sha)
      }
    }
    if (!treeSha) {
      throw new GitHubError(`Could not resolve repository tree for ${owner}/${repo}@${ref}`, 404)
    }

    const tree = await this.getJson(`/repos/${owner}/${repo}/git/trees/${treeSha}?recursive=1`)
    if (!isRecord(tree) || !Array.isArray(tree.tree)) return []

    const entries: TreeEntry[] = []
    for (const item of tree.tree) {
      if (!isRecord(item)) continue
      const path = str(item.path)
      const type = item.type
      if (path && (type === 'blob' || type === 'tree' || type === 'commit')) {
        entries.push({ path, type, size: typeof item.size === 'number' ? item.size : undefined })
      }
    }
    return entries
  }

  private async fetchContent(
    owner: string,
    repo: string,
    path: string,
    ref: string,
    maxChars: number,
    signal?: AbortSignal
  ): Promise<FetchedFile> {
    const encodedPath = path.split('/').map(encodeURIComponent).join('/')
    const obj = await this.getJson(`/repos/${owner}/${repo}/contents/${encodedPath}?ref=${encodeURIComponent(ref)}`, signal)

    if (obj === null) return { status: 'unavailable', path, reason: 'not found' }
    if (!isRecord(obj) || obj.type !== 'file') return { status: 'unavailable', path, reason: 'not a file' }

    const encoded = str(obj.content)
    if (!encoded) return { status: 'unavailable', path, reason: 'no inline content (file too large)' }

    const content = decodeBase64(encoded)
    if (looksBinary(content)) return { status: 'unavailable', path, reason: 'binary file' }
    return { status: 'ok', path, content: truncate(content, maxChars) }
  }

  async fetchContext(repoUrl: string, limits: ContextLimits): Promise<RepoContext> {
    const { owner, repo } = parseGitHubRepoUrl(repoUrl)

    const meta = await this.getJson(`/repos/${owner}/${repo}`)
    if (!isRecord(meta)) {
      throw new GitHubError(`Repository ${owner}/${repo} not found or is private.`, 404)
    }
    const defaultBranch = str(meta.default_branch)
    const ref = limits.ref || defaultBranch || 'main'

    const entries = await this.fetchTree(owner, repo, ref)
    const keyFiles = pickKeyFiles(entries, limits.maxKeyFiles)

    const keyFileContents: Record<string, string> = {}
    for (const path of keyFiles) {
      try {
        const file = await this.fetchContent(owner, repo, path, ref, limits.maxFileChars)
        keyFileContents[path] = file.status === 'ok' ? file.content : ''
      } catch {
        // A sampled file that cannot be read is kept with empty content
        keyFileContents[path] = ''
      }
    }

    let readme = ''
    const readmeInSample = keyFiles.find(p => /^readme(\.|$)/i.test(p) && keyFileContents[p])
    if (readmeInSample) {
      readme = truncate(keyFileContents[readmeInSample], limits.maxReadmeChars)
    } else {
      try {
        const obj = await this.getJson(`/repos/${owner}/${repo}/readme?ref=${encodeURIComponent(ref)}`)
        const encoded = isRecord(obj) ? str(obj.content) : null
        if (encoded) readme = truncate(decodeBase64(encoded), limits.maxReadmeChars)
      } catch {
        readme = ''
      }
    }

    const license = isRecord(meta.license) ? str(meta.license.spdx_id) : null

    return Object.freeze({
      repoUrl,
      owner,
      repo,
      fullName: str(meta.full_name) ?? `${owner}/${repo}`,
      description: str(meta.description),
      stars: typeof meta.stargazers_count === 'number' ? meta.stargazers_count : null,
      language: str(meta.language),
      topics: Array.isArray(meta.topics) ? meta.topics.filter((t): t is string => typeof t === 'string') : [],
      license,
      defaultBranch,
      ref,
      readme,
      treeSummary: buildTreeSummary(entries, { maxEntries: limits.maxTreeEntries }),
      treePaths: blobPaths(entries),
      keyFiles,
      keyFileContents: Object.freeze(keyFileContents)
    })
  }

  async fetchFile(
    context: RepoContext,
    path: string,
    options: { signal?: AbortSignal; maxChars?: number } = {}
  ): Promise<FetchedFile> {
    const cleaned = normalizePath(path)
    if (!cleaned) return { status: 'unavailable', path, reason: 'invalid path' }
    if (isBinaryPath(cleaned)) return { status: 'unavailable', path: cleaned, reason: 'binary file' }
    return this.fetchContent(context.owner, context.repo, cleaned, context.ref, options.maxChars ?? 16_000, options.signal)
  }
}
