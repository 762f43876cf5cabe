// src/repo-scanner/filter.ts
import { DEFAULT_IGNORE } from './types.js'

const BINARY_EXTENSIONS = [
  '.png', '.jpg', '.jpeg', '.gif', '.ico', '.svg', '.webp',
  '.woff', '.woff2', '.ttf', '.eot',
  '.zip', '.tar', '.gz', '.jar',
  '.pdf', '.doc', '.docx',
  '.exe', '.dll', '.so', '.dylib', '.class', '.pyc'
]

export function isBinaryPath(filePath: string): boolean {
  const lowerPath = filePath.toLowerCase()
  return BINARY_EXTENSIONS.some(ext => lowerPath.endsWith(ext))
}

export function shouldIgnore(filePath: string, customIgnore: string[] = []): boolean {
  const allIgnore = [...DEFAULT_IGNORE, ...customIgnore]
  const lowerSegments = filePath.toLowerCase().split('/')

  for (const pattern of allIgnore) {
    if (pattern.startsWith('*.')) {
      if (filePath.toLowerCase().endsWith(pattern.slice(1))) return true
    } else {
      // Match whole segments: "build" must not hide "src/builder.ts"
      const lowerPattern = pattern.toLowerCase()
      if (lowerSegments.some(seg => seg === lowerPattern)) return true
    }
  }

  return false
}

/**
 * Normalise a path proposed by a model or a user: trim, drop leading "./" and "/",
 * collapse duplicate slashes. Returns an empty string for unusable input.
 */
export function normalizePath(input: string): string {
  let path = input.trim().replace(/\\/g, '/').replace(/\/{2,}/g, '/')
  while (path.startsWith('./') || path.startsWith('/')) {
    path = path.startsWith('./') ? path.slice(2) : path.slice(1)
  }
  if (path.split('/').includes('..')) return ''
  return path
}
