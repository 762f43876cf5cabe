export { GitHubClient, parseGitHubRepoUrl } from './client.js'
export type { GitHubClientOptions, ParsedRepoUrl } from './client.js'
export type { ContextLimits, FetchedFile, RepoContext, RepoSource, TreeEntry } from './types.js'
