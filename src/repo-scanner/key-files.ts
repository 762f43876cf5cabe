// src/repo-scanner/key-files.ts
import type { TreeEntry } from '../github/types.js'
import { shouldIgnore } from './filter.js'
import { ENTRYPOINT_SUFFIXES, WELL_KNOWN_FILES } from './types.js'

/**
 * Pick representative files to bootstrap an understanding of the repository:
 * well-known root files in priority order, then entrypoints and docs in tree order.
 */
export function pickKeyFiles(entries: TreeEntry[], maxFiles: number): string[] {
  const blobs = entries.filter(e => e.type === 'blob' && !shouldIgnore(e.path))
  const present = new Set(blobs.map(e => e.path))
  const found: string[] = []

  for (const candidate of WELL_KNOWN_FILES) {
    if (present.has(candidate)) found.push(candidate)
  }

  for (const { path } of blobs) {
    const lower = path.toLowerCase()
    if (ENTRYPOINT_SUFFIXES.some(suffix => `/${lower}`.endsWith(suffix))) {
      found.push(path)
    } else if (lower.startsWith('docs/') || lower.includes('/docs/')) {
      if (lower.endsWith('.md') || lower.endsWith('.rst')) found.push(path)
    }
  }

  return [...new Set(found)].slice(0, Math.max(0, maxFiles))
}
