/**
 * Error taxonomy for the fetch → filter → sort pipeline.
 *
 * Each class maps to exactly one HTTP status in the web connector's error handler.
 */

// ==================== Upstream ====================

export interface UpstreamErrorOptions {
  /** HTTP status returned by the provider, when it answered at all. */
  status?: number
  cause?: unknown
}

/** The provider call failed: transport error, non-2xx status, or an unusable body. */
export class UpstreamError extends Error {
  readonly status: number | undefined

  constructor(message: string, options: UpstreamErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'UpstreamError'
    this.status = options.status
  }
}

// ==================== Request ====================

/** A query parameter could not be parsed as its expected type. */
export class MalformedQueryError extends Error {
  constructor(
    readonly param: string,
    readonly value: string,
    readonly expected: 'an integer' | 'a number',
  ) {
    super(`Invalid value "${value}" for query parameter ${param}: expected ${expected}`)
    this.name = 'MalformedQueryError'
  }
}

// ==================== Records ====================

/** A fetched record lacks a field the transform needed, or carries it with the wrong type. */
export class MissingFieldError extends Error {
  constructor(
    readonly field: string,
    readonly index: number,
  ) {
    super(`Upstream record at index ${index} has no usable "${field}" field`)
    this.name = 'MissingFieldError'
  }
}

// ==================== Startup ====================

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
