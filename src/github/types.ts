// src/github/types.ts
export interface ContextLimits {
  maxReadmeChars: number
  maxTreeEntries: number
  maxKeyFiles: number
  maxFileChars: number
  /** Branch, tag or commit SHA. Empty means the default branch. */
  ref?: string
}

export interface RepoContext {
  readonly repoUrl: string
  readonly owner: string
  readonly repo: string
  readonly fullName: string
  readonly description: string | null
  readonly stars: number | null
  readonly language: string | null
  readonly topics: readonly string[]
  readonly license: string | null
  readonly defaultBranch: string | null
  readonly ref: string
  readonly readme: string
  readonly treeSummary: string
  readonly treePaths: readonly string[]
  readonly keyFiles: readonly string[]
  readonly keyFileContents: Readonly<Record<string, string>>
}

export type FetchedFile =
  | { status: 'ok'; path: string; content: string }
  | { status: 'unavailable'; path: string; reason: string }

/** What the orchestrator needs from the repository host. */
export interface RepoSource {
  fetchContext(repoUrl: string, limits: ContextLimits): Promise<RepoContext>
  fetchFile(context: RepoContext, path: string, options?: { signal?: AbortSignal; maxChars?: number }): Promise<FetchedFile>
}

export interface TreeEntry {
  path: string
  type: 'blob' | 'tree' | 'commit'
  size?: number
}
