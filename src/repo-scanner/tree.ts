// src/repo-scanner/tree.ts
import type { TreeEntry } from '../github/types.js'
import { shouldIgnore } from './filter.js'
import type { TreeSummaryOptions } from './types.js'

export const TRUNCATION_MARKER = '\n...[truncated]...'

export function truncate(text: string, maxChars: number): string {
  if (maxChars <= 0) return ''
  if (text.length <= maxChars) return text
  if (maxChars <= TRUNCATION_MARKER.length) return TRUNCATION_MARKER.slice(0, maxChars)
  return text.slice(0, maxChars - TRUNCATION_MARKER.length) + TRUNCATION_MARKER
}

function depth(path: string): number {
  return path.replace(/\/$/, '').split('/').length - 1
}

/**
 * Render one line per entry, shallow paths first, directories with a trailing slash.
 */
export function buildTreeSummary(entries: TreeEntry[], options: TreeSummaryOptions): string {
  const paths = entries
    .filter(e => !shouldIgnore(e.path, options.ignore))
    .map(e => (e.type === 'tree' ? `${e.path.replace(/\/$/, '')}/` : e.path))

  paths.sort((a, b) => depth(a) - depth(b) || (a < b ? -1 : a > b ? 1 : 0))

  return paths
    .slice(0, Math.max(0, options.maxEntries))
    .map(p => `${p.endsWith('/') ? '📁' : '📄'} ${p}`)
    .join('\n')
}

export function blobPaths(entries: TreeEntry[]): string[] {
  return entries.filter(e => e.type === 'blob').map(e => e.path)
}
