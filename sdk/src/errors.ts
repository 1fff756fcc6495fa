/**
 * Error taxonomy.
 *
 * Every loader and writer failure surfaces as one of these; none are
 * swallowed. The underlying failure, when there is one, is kept on `cause`.
 */

/**
 * Base class for all protocol errors.
 */
export class PipesError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PipesError'
  }
}

/**
 * Error thrown when a bootstrap parameter is missing or cannot be decoded.
 */
export class ParamsError extends PipesError {
  constructor(
    message: string,
    public readonly key?: string,
    options?: { cause?: unknown }
  ) {
    super(key === undefined ? message : `${key}: ${message}`, options)
    this.name = 'ParamsError'
  }
}

/**
 * Error thrown when the run context is malformed or violates the schema.
 */
export class ContextDecodeError extends PipesError {
  constructor(
    message: string,
    public readonly field?: string,
    options?: { cause?: unknown }
  ) {
    super(field === undefined ? message : `${field}: ${message}`, options)
    this.name = 'ContextDecodeError'
  }
}

/**
 * Error thrown when the message sink cannot be determined or opened.
 */
export class ChannelOpenError extends PipesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ChannelOpenError'
  }
}

/**
 * Error thrown when a message cannot be written to the channel.
 */
export class WriteError extends PipesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'WriteError'
  }
}

/**
 * Error thrown on API misuse: double init, reporting after close,
 * unknown asset keys, unserializable metadata, or reading context data
 * that is absent.
 */
export class UsageError extends PipesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'UsageError'
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
