/**
 * Default context loader: inline context or a JSON file.
 *
 * Params shapes:
 * - `{ "context": { ... } }` - the context itself (a JSON string is accepted too)
 * - `{ "path": "/path/to/context.json" }` - a file holding the context
 *
 * @module
 */
import { readFileSync } from 'node:fs'
import {
  type ContextLoader,
  ContextDecodeError,
  createContext,
  errorMessage,
  type Params,
  type PipesContext
} from '@pipes-protocol/sdk'

/** Params key holding an inline context */
export const CONTEXT_INLINE_KEY = 'context'

/** Params key holding a context file path */
export const CONTEXT_PATH_KEY = 'path'

function parseContextJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new ContextDecodeError(`${source} is not valid JSON: ${errorMessage(err)}`, undefined, {
      cause: err
    })
  }
}

export class DefaultContextLoader implements ContextLoader {
  /**
   * @throws ContextDecodeError if neither shape matches, the file cannot be
   *   read, the JSON is malformed, or the context violates the schema
   */
  loadContext(params: Params): PipesContext {
    return createContext(this.loadRaw(params))
  }

  private loadRaw(params: Params): unknown {
    if (CONTEXT_INLINE_KEY in params) {
      const inline = params[CONTEXT_INLINE_KEY]
      return typeof inline === 'string' ? parseContextJson(inline, 'inline context') : inline
    }

    if (CONTEXT_PATH_KEY in params) {
      const path = params[CONTEXT_PATH_KEY]
      if (typeof path !== 'string' || path === '') {
        throw new ContextDecodeError('context path must be a non-empty string', CONTEXT_PATH_KEY)
      }

      let text: string
      try {
        text = readFileSync(path, 'utf-8')
      } catch (err) {
        throw new ContextDecodeError(
          `cannot read context file "${path}": ${errorMessage(err)}`,
          undefined,
          { cause: err }
        )
      }
      return parseContextJson(text, `context file "${path}"`)
    }

    throw new ContextDecodeError(
      `context params must contain "${CONTEXT_INLINE_KEY}" or "${CONTEXT_PATH_KEY}"`
    )
  }
}
