import type {
  ClosedParams,
  MessageMethod,
  ParamsMap,
  PipesMessage,
  SerializedError
} from './types/messages'

/**
 * Maximum depth of `cause` chains carried in a closed message.
 */
const MAX_CAUSE_DEPTH = 8

/**
 * Build a message. Messages are immutable once constructed.
 */
export function createMessage<M extends MessageMethod>(
  method: M,
  params: ParamsMap[M]
): PipesMessage<M> {
  return Object.freeze({ method, params })
}

/**
 * Serialize a message to its wire form: one JSON object terminated by `\n`.
 *
 * JSON.stringify never emits a raw newline, so one message is always one line.
 */
export function encodeMessageLine(message: PipesMessage): string {
  return `${JSON.stringify({ method: message.method, params: message.params })}\n`
}

/**
 * Describe a thrown value for the wire. Non-Error values are stringified.
 */
export function serializeError(err: unknown, depth = 0): SerializedError {
  if (!(err instanceof Error)) {
    return { name: 'NonError', message: String(err) }
  }
  return {
    name: err.name,
    message: err.message,
    ...(err.stack !== undefined && { stack: err.stack }),
    ...(err.cause !== undefined &&
      depth + 1 < MAX_CAUSE_DEPTH && { cause: serializeError(err.cause, depth + 1) })
  }
}

/**
 * Params for the closed sentinel, carrying the in-flight error if any.
 */
export function closedParams(error?: unknown): ClosedParams {
  return error === undefined ? {} : { exception: serializeError(error) }
}
