// src/index.ts
export * from './budget/index.js'
export * from './config/index.js'
export * from './github/index.js'
export * from './orchestrator/index.js'
export * from './parser/index.js'
export * from './providers/index.js'
export * from './reporter/index.js'
export * from './stages/index.js'
export { ConfigurationError, GitHubError, InvalidTransitionError, ModelError, errorMessage } from './errors.js'
export * from './repo-scanner/index.js'
