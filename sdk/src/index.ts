// Context
export { createContext, decodeContextData, PipesContext } from './context'
// Errors
export {
  ChannelOpenError,
  ContextDecodeError,
  errorMessage,
  ParamsError,
  PipesError,
  UsageError,
  WriteError
} from './errors'
// Message construction (for channel implementations)
export { closedParams, createMessage, encodeMessageLine, serializeError } from './messages'
// Session API and strategy interfaces
export type {
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
export type { OpenSessionOptions } from './session-impl'
export { hasActiveSession, openSession, PipesSession } from './session-impl'
// Context types
export type {
  PartitionKeyRange,
  PartitionTimeWindow,
  PipesContextData,
  ProvenanceData
} from './types/context'
// Message types
export type {
  AnyPipesMessage,
  AssetCheckParams,
  AssetCheckSeverity,
  AssetMaterializationParams,
  ClosedParams,
  LogLevel,
  LogParams,
  MessageMethod,
  Metadata,
  ParamsMap,
  PipesMessage,
  SerializedError
} from './types/messages'
// Params types
export type { JsonObject, JsonValue, Params } from './types/params'
export { deepFreeze, isJsonObject } from './types/params'
