// src/errors.ts

/**
 * Raised for bad configuration before any model request is made:
 * unknown model pricing, invalid flags, a malformed repository URL.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Transport-level failure talking to a model provider. Always fatal for the run.
 */
export class ModelError extends Error {
  provider: string
  status?: number

  constructor(provider: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'ModelError'
    this.provider = provider
    this.status = options.status
  }
}

export class GitHubError extends Error {
  status: number

  constructor(message: string, status: number) {
    super(message)
    this.name = 'GitHubError'
    this.status = status
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Invalid deep-dive transition: ${from} -> ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
