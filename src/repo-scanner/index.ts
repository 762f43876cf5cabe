export { shouldIgnore, isBinaryPath, normalizePath } from './filter.js'
export { buildTreeSummary, blobPaths, truncate, TRUNCATION_MARKER } from './tree.js'
export { pickKeyFiles } from './key-files.js'
export { DEFAULT_IGNORE, WELL_KNOWN_FILES } from './types.js'
export type { TreeSummaryOptions } from './types.js'
