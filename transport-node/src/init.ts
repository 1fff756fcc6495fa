/**
 * Session entry points wired to the Node.js default strategies.
 *
 * Lifecycle (withSession):
 * - init(): params → context → channel
 * - fn(session)
 * - close() on success, close(error) on failure
 *
 * The closed sentinel is written on every exit path out of withSession();
 * a process 'exit' listener covers process.exit() and uncaught exceptions.
 *
 * @module
 */
import {
  type ContextLoader,
  type MessageWriter,
  openSession,
  type ParamsLoader,
  type PipesSession
} from '@pipes-protocol/sdk'
import { DefaultContextLoader } from './context-loader.js'
import { EnvParamsLoader } from './params-loader.js'
import { DefaultMessageWriter } from './writer/message-writer.js'

/**
 * Strategy overrides for init(). Omitted strategies use the defaults:
 * EnvParamsLoader, DefaultContextLoader, DefaultMessageWriter.
 */
export interface InitOptions {
  readonly paramsLoader?: ParamsLoader
  readonly contextLoader?: ContextLoader
  readonly messageWriter?: MessageWriter
  /** Close the session on process exit if still open. Defaults to true. */
  readonly exitHook?: boolean
}

/**
 * Open this process's session.
 *
 * @throws ParamsError, ContextDecodeError or ChannelOpenError from the
 *   first step that fails
 * @throws UsageError if a session is already open
 */
export function init(options: InitOptions = {}): PipesSession {
  return openSession({
    paramsLoader: options.paramsLoader ?? new EnvParamsLoader(),
    contextLoader: options.contextLoader ?? new DefaultContextLoader(),
    messageWriter: options.messageWriter ?? new DefaultMessageWriter(),
    exitHook: options.exitHook
  })
}

/**
 * Run `fn` inside a session that is closed on every exit path.
 *
 * - `fn` returns: the session is closed cleanly and the result returned
 * - `fn` throws or rejects: the session is closed with the error recorded
 *   in the closed message, and the error is rethrown
 * - closing fails while an error is in flight: an AggregateError holding
 *   both is thrown
 */
export async function withSession<T>(
  fn: (session: PipesSession) => T | Promise<T>,
  options: InitOptions = {}
): Promise<T> {
  const session = init(options)

  let result: T
  try {
    result = await fn(session)
  } catch (err) {
    try {
      session.close(err)
    } catch (closeErr) {
      throw new AggregateError([err, closeErr], 'Session failed and could not be closed')
    }
    throw err
  }

  session.close()
  return result
}
