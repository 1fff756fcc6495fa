import type { PipesContext } from './context'
import type { AssetCheckSeverity, ClosedParams, LogLevel, Metadata, PipesMessage } from './types/messages'
import type { Params } from './types/params'

/**
 * Options for reporting an asset materialization.
 */
export interface ReportAssetMaterializationOptions {
  /**
   * Asset that was materialized. Defaults to the context's single asset key.
   */
  asset_key?: string
  /** Free-form metadata, written verbatim */
  metadata?: Metadata
  /** Data version of the materialized asset */
  data_version?: string
}

/**
 * Options for reporting an asset check result.
 */
export interface ReportAssetCheckOptions {
  /** Name of the check */
  check_name: string
  /**
   * Asset the check ran against. Defaults to the context's single asset key.
   */
  asset_key?: string
  /** Whether the check passed */
  passed: boolean
  /** Severity of a failed check. Defaults to 'ERROR'. */
  severity?: AssetCheckSeverity
  /** Free-form metadata, written verbatim */
  metadata?: Metadata
}

/**
 * Options for emitting a log message.
 */
export interface LogOptions {
  level: LogLevel
  message: string
}

/**
 * Lifecycle state of a session.
 * `Uninitialized` has no value: a session object only exists once opened.
 */
export type SessionState = 'opened' | 'closed'

/**
 * The reporting interface user code holds for the lifetime of a session.
 *
 * All methods are synchronous: each completes (the message is written) or
 * throws before returning.
 */
export interface SessionAPI {
  /** The run context. Read-only. */
  readonly context: PipesContext

  readonly state: SessionState

  readonly isClosed: boolean

  /**
   * Report that an asset was materialized.
   * @throws UsageError after close, for an unknown or already materialized
   *   asset, or for metadata that cannot be serialized to JSON
   * @throws WriteError if the channel write fails
   */
  reportAssetMaterialization(options?: ReportAssetMaterializationOptions): void

  /**
   * Report the result of an asset check.
   * @throws UsageError after close, for an unknown asset, or for metadata
   *   that cannot be serialized to JSON
   * @throws WriteError if the channel write fails
   */
  reportAssetCheck(options: ReportAssetCheckOptions): void

  /**
   * Emit a log line to the launcher.
   * @throws UsageError after close
   * @throws WriteError if the channel write fails
   */
  log(options: LogOptions): void

  /** Convenience: emit a DEBUG log */
  debug(message: string): void

  /** Convenience: emit an INFO log */
  info(message: string): void

  /** Convenience: emit a WARNING log */
  warning(message: string): void

  /** Convenience: emit an ERROR log */
  error(message: string): void

  /** Convenience: emit a CRITICAL log */
  critical(message: string): void

  /**
   * Write the closed sentinel and release the channel.
   * Idempotent: a second call does nothing.
   *
   * @param error - The error in flight, if the session is ending because of one
   * @throws WriteError if the sentinel cannot be written (the session is closed regardless)
   */
  close(error?: unknown): void
}

/**
 * Locates and decodes the two bootstrap parameter blobs.
 */
export interface ParamsLoader {
  /**
   * True if the process was launched under the protocol
   * (both parameter values are present).
   */
  isActive(): boolean

  /** @throws ParamsError if the value is absent or undecodable */
  loadContextParams(): Params

  /** @throws ParamsError if the value is absent or undecodable */
  loadMessagesParams(): Params
}

/**
 * Turns context params into a run context.
 */
export interface ContextLoader {
  /** @throws ContextDecodeError if the context cannot be read or is invalid */
  loadContext(params: Params): PipesContext
}

/**
 * An open, append-only channel back to the launcher.
 * Exclusively owned by one session.
 *
 * @remarks
 * **Single-writer assumption**: channels are not safe for concurrent use.
 */
export interface MessageWriterChannel {
  /**
   * Write one message. Returns only once the message has been handed to the OS.
   * @throws WriteError on I/O failure or if the channel was already closed
   */
  writeMessage(message: PipesMessage): void

  /**
   * Write the closed sentinel as the final message and release the
   * underlying handle. The handle is released even if the write fails.
   * @throws WriteError if the sentinel cannot be written
   */
  close(params?: ClosedParams): void
}

/**
 * Turns messages params into an open channel.
 */
export interface MessageWriter {
  /** @throws ChannelOpenError if no sink can be determined or opened */
  open(params: Params): MessageWriterChannel
}
