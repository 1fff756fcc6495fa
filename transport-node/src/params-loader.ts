/**
 * Params loaders: where the two encoded params values come from.
 *
 * - MappingParamsLoader: any string mapping (literal values)
 * - EnvParamsLoader: process environment (default)
 * - CliArgsParamsLoader: command-line flags
 *
 * @module
 */
import { type Params, ParamsError, type ParamsLoader } from '@pipes-protocol/sdk'
import { decodeParams } from './params.js'

/** Environment variable carrying encoded context params */
export const PIPES_CONTEXT_ENV_VAR = 'PIPES_CONTEXT'

/** Environment variable carrying encoded messages params */
export const PIPES_MESSAGES_ENV_VAR = 'PIPES_MESSAGES'

/** Command-line flag carrying encoded context params */
export const PIPES_CONTEXT_CLI_FLAG = '--pipes-context'

/** Command-line flag carrying encoded messages params */
export const PIPES_MESSAGES_CLI_FLAG = '--pipes-messages'

export interface MappingParamsLoaderOptions {
  /** Key holding encoded context params */
  readonly contextKey: string
  /** Key holding encoded messages params */
  readonly messagesKey: string
}

/**
 * Loads params from a string mapping. The mapping is read on every call,
 * so a live mapping such as `process.env` reflects its current state.
 */
export class MappingParamsLoader implements ParamsLoader {
  constructor(
    private readonly mapping: Readonly<Record<string, string | undefined>>,
    private readonly keys: MappingParamsLoaderOptions
  ) {}

  isActive(): boolean {
    return this.isPresent(this.keys.contextKey) && this.isPresent(this.keys.messagesKey)
  }

  loadContextParams(): Params {
    return this.load(this.keys.contextKey)
  }

  loadMessagesParams(): Params {
    return this.load(this.keys.messagesKey)
  }

  private isPresent(key: string): boolean {
    const value = this.mapping[key]
    return value !== undefined && value !== ''
  }

  private load(key: string): Params {
    const value = this.mapping[key]
    if (value === undefined || value === '') {
      throw new ParamsError('is not set', key)
    }
    return decodeParams(value, key)
  }
}

export interface EnvParamsLoaderOptions {
  /** Environment to read. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv
  /** Defaults to PIPES_CONTEXT */
  readonly contextVar?: string
  /** Defaults to PIPES_MESSAGES */
  readonly messagesVar?: string
}

/**
 * Loads params from environment variables.
 */
export class EnvParamsLoader extends MappingParamsLoader {
  constructor(options: EnvParamsLoaderOptions = {}) {
    super(options.env ?? process.env, {
      contextKey: options.contextVar ?? PIPES_CONTEXT_ENV_VAR,
      messagesKey: options.messagesVar ?? PIPES_MESSAGES_ENV_VAR
    })
  }
}

export interface CliArgsParamsLoaderOptions {
  /** Arguments to scan. Defaults to process.argv. */
  readonly argv?: readonly string[]
  /** Defaults to --pipes-context */
  readonly contextFlag?: string
  /** Defaults to --pipes-messages */
  readonly messagesFlag?: string
}

/**
 * Collect the values of the given flags, in `--flag value` or
 * `--flag=value` form. The first occurrence of a flag wins.
 */
function collectFlags(
  argv: readonly string[],
  flags: readonly string[]
): Record<string, string | undefined> {
  const values: Record<string, string | undefined> = {}
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    for (const flag of flags) {
      if (values[flag] !== undefined) continue
      if (arg === flag) {
        values[flag] = argv[i + 1]
      } else if (arg.startsWith(`${flag}=`)) {
        values[flag] = arg.slice(flag.length + 1)
      }
    }
  }
  return values
}

/**
 * Loads params from command-line flags.
 * Arguments are scanned once, at construction.
 */
export class CliArgsParamsLoader extends MappingParamsLoader {
  constructor(options: CliArgsParamsLoaderOptions = {}) {
    const contextKey = options.contextFlag ?? PIPES_CONTEXT_CLI_FLAG
    const messagesKey = options.messagesFlag ?? PIPES_MESSAGES_CLI_FLAG
    super(collectFlags(options.argv ?? process.argv, [contextKey, messagesKey]), {
      contextKey,
      messagesKey
    })
  }
}

/**
 * True if the environment indicates this process was launched under the protocol.
 */
export function isPipesProcess(env: NodeJS.ProcessEnv = process.env): boolean {
  return new EnvParamsLoader({ env }).isActive()
}
