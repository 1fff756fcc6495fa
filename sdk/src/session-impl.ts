/**
 * Session facade: the single object user code reports through.
 *
 * Responsibilities:
 * - Sequence initialization: params → context → channel
 * - Enforce one active session per process
 * - Validate reporting calls before anything is written
 * - Guarantee exactly one `closed` sentinel, written last
 *
 * State machine: Uninitialized → Opened → Closed.
 * Uninitialized is the absence of a session; openSession() returns an
 * opened session, and close() moves it to closed. There is no way back.
 *
 * @module
 */
import type { PipesContext } from './context'
import { errorMessage, UsageError, WriteError } from './errors'
import { closedParams, createMessage, encodeMessageLine } from './messages'
import type {
  ContextLoader,
  LogOptions,
  MessageWriter,
  MessageWriterChannel,
  ParamsLoader,
  ReportAssetCheckOptions,
  ReportAssetMaterializationOptions,
  SessionAPI,
  SessionState
} from './session'
import type { AssetCheckSeverity, LogLevel, MessageMethod, PipesMessage } from './types/messages'

const SEVERITIES: readonly AssetCheckSeverity[] = ['WARN', 'ERROR']
const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']

/**
 * Options for opening a session.
 * Each strategy can be substituted without touching the session.
 */
export interface OpenSessionOptions {
  readonly paramsLoader: ParamsLoader
  readonly contextLoader: ContextLoader
  readonly messageWriter: MessageWriter
  /**
   * Close the session from a one-shot process 'exit' listener if it is
   * still open when the process exits. An uncaught exception seen while
   * open is recorded in that closed message. Defaults to true.
   */
  readonly exitHook?: boolean
}

/**
 * Listeners an open session holds on `process`.
 */
interface ProcessHooks {
  readonly onExit: () => void
  readonly onUncaughtException: (err: Error) => void
}

/**
 * The process-scoped session slot. Owned by this module; claimed by
 * openSession() and released by the session itself when it closes.
 */
let activeSession: PipesSession | null = null

/**
 * True while a session is open in this process.
 */
export function hasActiveSession(): boolean {
  return activeSession !== null
}

/**
 * Normalize a channel failure to WriteError, keeping the original as cause.
 */
function toWriteError(err: unknown, method: MessageMethod): WriteError {
  if (err instanceof WriteError) {
    return err
  }
  return new WriteError(`Failed to write ${method} message: ${errorMessage(err)}`, { cause: err })
}

/**
 * An opened session. Obtain one through openSession() (or init() in the
 * Node transport); never construct directly.
 */
export class PipesSession implements SessionAPI {
  private closed = false
  private readonly materialized = new Set<string>()
  private readonly processHooks: ProcessHooks | null
  /** Uncaught exception seen while open; recorded in the closed message on exit */
  private uncaught: Error | undefined = undefined

  /** @internal */
  constructor(
    readonly context: PipesContext,
    private readonly channel: MessageWriterChannel,
    private readonly releaseSlot: (session: PipesSession) => void,
    exitHook: boolean
  ) {
    if (exitHook) {
      this.processHooks = {
        onExit: () => this.closeOnExit(),
        onUncaughtException: (err) => {
          this.uncaught ??= err
        }
      }
      process.once('exit', this.processHooks.onExit)
      process.on('uncaughtExceptionMonitor', this.processHooks.onUncaughtException)
    } else {
      this.processHooks = null
    }
  }

  get state(): SessionState {
    return this.closed ? 'closed' : 'opened'
  }

  get isClosed(): boolean {
    return this.closed
  }

  reportAssetMaterialization(options: ReportAssetMaterializationOptions = {}): void {
    this.assertOpen('reportAssetMaterialization')
    const asset_key = this.resolveAssetKey(options.asset_key)
    if (this.materialized.has(asset_key)) {
      throw new UsageError(`Asset "${asset_key}" has already been materialized in this session`)
    }

    this.write(
      createMessage('report_asset_materialization', {
        metadata: options.metadata ?? {},
        asset_key,
        ...(options.data_version !== undefined && { data_version: options.data_version })
      })
    )
    this.materialized.add(asset_key)
  }

  reportAssetCheck(options: ReportAssetCheckOptions): void {
    this.assertOpen('reportAssetCheck')
    if (typeof options.check_name !== 'string' || options.check_name === '') {
      throw new UsageError('check_name must be a non-empty string')
    }
    if (typeof options.passed !== 'boolean') {
      throw new UsageError('passed must be a boolean')
    }
    const severity = options.severity ?? 'ERROR'
    if (!SEVERITIES.includes(severity)) {
      throw new UsageError(`severity must be one of: ${SEVERITIES.join(', ')}`)
    }
    const asset_key = this.resolveAssetKey(options.asset_key)

    this.write(
      createMessage('report_asset_check', {
        asset_key,
        check_name: options.check_name,
        passed: options.passed,
        severity,
        metadata: options.metadata ?? {}
      })
    )
  }

  log(options: LogOptions): void {
    this.assertOpen('log')
    if (!LOG_LEVELS.includes(options.level)) {
      throw new UsageError(`level must be one of: ${LOG_LEVELS.join(', ')}`)
    }
    if (typeof options.message !== 'string') {
      throw new UsageError('message must be a string')
    }
    this.write(createMessage('log', { message: options.message, level: options.level }))
  }

  debug(message: string): void {
    this.log({ level: 'DEBUG', message })
  }

  info(message: string): void {
    this.log({ level: 'INFO', message })
  }

  warning(message: string): void {
    this.log({ level: 'WARNING', message })
  }

  error(message: string): void {
    this.log({ level: 'ERROR', message })
  }

  critical(message: string): void {
    this.log({ level: 'CRITICAL', message })
  }

  close(error?: unknown): void {
    if (this.closed) {
      return
    }
    // Terminal before the write: a failed sentinel must not leave the
    // session reporting or let a retry write a second sentinel.
    this.closed = true
    if (this.processHooks !== null) {
      process.off('exit', this.processHooks.onExit)
      process.off('uncaughtExceptionMonitor', this.processHooks.onUncaughtException)
    }
    this.releaseSlot(this)

    try {
      this.channel.close(closedParams(error))
    } catch (err) {
      throw toWriteError(err, 'closed')
    }
  }

  private closeOnExit(): void {
    try {
      this.close(this.uncaught)
    } catch (err) {
      // No caller exists at process exit; report and let the exit proceed.
      process.stderr.write(`[pipes] failed to close session on exit: ${errorMessage(err)}\n`)
    }
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new UsageError(`Cannot call ${operation}(): the session has been closed`)
    }
  }

  /**
   * Resolve the target asset key against the context's asset keys.
   */
  private resolveAssetKey(assetKey: string | undefined): string {
    const known = this.context.asset_keys
    if (assetKey !== undefined) {
      if (!known.includes(assetKey)) {
        throw new UsageError(
          `Asset key "${assetKey}" is not one of this run's asset keys: [${known.join(', ')}]`
        )
      }
      return assetKey
    }

    const [only, ...rest] = known
    if (only === undefined) {
      throw new UsageError('asset_key must be given: this run has no asset keys')
    }
    if (rest.length > 0) {
      throw new UsageError(
        `asset_key must be given: this run has ${known.length} asset keys [${known.join(', ')}]`
      )
    }
    return only
  }

  private write(message: PipesMessage): void {
    try {
      encodeMessageLine(message)
    } catch (err) {
      throw new UsageError(`Cannot serialize ${message.method} message: ${errorMessage(err)}`, {
        cause: err
      })
    }

    try {
      this.channel.writeMessage(message)
    } catch (err) {
      throw toWriteError(err, message.method)
    }
  }
}

/**
 * Open the process's session.
 *
 * Steps, in order; the first failure propagates and nothing is retained:
 * 1. Load context params, then messages params (ParamsError)
 * 2. Load the context (ContextDecodeError)
 * 3. Open the channel (ChannelOpenError)
 *
 * @throws UsageError if a session is already open in this process
 */
export function openSession(options: OpenSessionOptions): PipesSession {
  if (activeSession !== null) {
    throw new UsageError(
      'A session is already active in this process; close it before opening another'
    )
  }

  const contextParams = options.paramsLoader.loadContextParams()
  const messagesParams = options.paramsLoader.loadMessagesParams()
  const context = options.contextLoader.loadContext(contextParams)
  const channel = options.messageWriter.open(messagesParams)

  const session = new PipesSession(
    context,
    channel,
    (closing) => {
      if (activeSession === closing) {
        activeSession = null
      }
    },
    options.exitHook ?? true
  )
  activeSession = session
  return session
}
