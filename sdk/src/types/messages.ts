/**
 * Wire message types.
 *
 * Every message is one JSON object on its own line:
 * `{"method": <method>, "params": {...}}`
 */
import type { JsonObject } from './params'

/**
 * All supported message methods.
 *
 * `closed` is the terminal sentinel: written exactly once, always last.
 */
export type MessageMethod = 'report_asset_materialization' | 'report_asset_check' | 'log' | 'closed'

/**
 * Severity attached to asset check results.
 */
export type AssetCheckSeverity = 'WARN' | 'ERROR'

/**
 * Log levels for the log message.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL'

/**
 * Free-form metadata attached to materializations and checks.
 * Written to the wire verbatim.
 */
export type Metadata = JsonObject

// ============================================
// Params Types (one per method)
// ============================================

/**
 * Params for 'report_asset_materialization' messages.
 */
export interface AssetMaterializationParams {
  readonly metadata: Metadata
  /** Resolved asset key, always one of the context's asset_keys */
  readonly asset_key: string
  readonly data_version?: string
}

/**
 * Params for 'report_asset_check' messages.
 */
export interface AssetCheckParams {
  readonly asset_key: string
  readonly check_name: string
  readonly passed: boolean
  readonly severity: AssetCheckSeverity
  readonly metadata: Metadata
}

/**
 * Params for 'log' messages.
 */
export interface LogParams {
  readonly message: string
  readonly level: LogLevel
}

/**
 * Error description carried by a `closed` message when the session ended
 * with an error in flight.
 */
export interface SerializedError {
  readonly name: string
  readonly message: string
  readonly stack?: string
  readonly cause?: SerializedError
}

/**
 * Params for 'closed' messages. Empty on a clean close.
 */
export interface ClosedParams {
  readonly exception?: SerializedError
}

/**
 * Maps message methods to their params types.
 */
export interface ParamsMap {
  report_asset_materialization: AssetMaterializationParams
  report_asset_check: AssetCheckParams
  log: LogParams
  closed: ClosedParams
}

/**
 * Typed message with a specific method and params.
 */
export interface PipesMessage<M extends MessageMethod = MessageMethod> {
  readonly method: M
  readonly params: ParamsMap[M]
}

/**
 * Union type of all possible messages.
 */
export type AnyPipesMessage = {
  [K in MessageMethod]: PipesMessage<K>
}[MessageMethod]
