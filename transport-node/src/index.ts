/**
 * Pipes Node Transport
 *
 * Default params loaders, context loader and message channels for
 * processes launched under the Pipes protocol, plus the init() and
 * withSession() entry points.
 *
 * @packageDocumentation
 */

// Protocol types, errors and the session facade
export * from '@pipes-protocol/sdk'

// Session entry points
export { type InitOptions, init, withSession } from './init.js'

// Params
export { decodeParams, encodeParams } from './params.js'
export {
  CliArgsParamsLoader,
  type CliArgsParamsLoaderOptions,
  EnvParamsLoader,
  type EnvParamsLoaderOptions,
  isPipesProcess,
  MappingParamsLoader,
  type MappingParamsLoaderOptions,
  PIPES_CONTEXT_CLI_FLAG,
  PIPES_CONTEXT_ENV_VAR,
  PIPES_MESSAGES_CLI_FLAG,
  PIPES_MESSAGES_ENV_VAR
} from './params-loader.js'

// Context
export { CONTEXT_INLINE_KEY, CONTEXT_PATH_KEY, DefaultContextLoader } from './context-loader.js'

// Writer
export {
  DefaultMessageWriter,
  type DefaultMessageWriterOptions,
  FileChannel,
  LineChannel,
  MESSAGES_MODE_KEY,
  MESSAGES_PATH_KEY,
  MESSAGES_STDIO_KEY,
  ReplaceFileChannel,
  type StdStream,
  StreamChannel
} from './writer/index.js'
