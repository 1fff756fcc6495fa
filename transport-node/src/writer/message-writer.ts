/**
 * Default message writer: turns messages params into a channel.
 *
 * Params shapes:
 * - `{ "path": p }` or `{ "path": p, "mode": "append" }` - FileChannel
 * - `{ "path": p, "mode": "replace" }` - ReplaceFileChannel
 * - `{ "stdio": "stdout" | "stderr" }` - StreamChannel
 *
 * @module
 */
import {
  ChannelOpenError,
  type MessageWriter,
  type MessageWriterChannel,
  type Params
} from '@pipes-protocol/sdk'
import { FileChannel, ReplaceFileChannel, type StdStream, StreamChannel } from './channel.js'

/** Params key holding the sink file path */
export const MESSAGES_PATH_KEY = 'path'

/** Params key selecting append or replace mode for file sinks */
export const MESSAGES_MODE_KEY = 'mode'

/** Params key selecting a standard stream sink */
export const MESSAGES_STDIO_KEY = 'stdio'

export interface DefaultMessageWriterOptions {
  /** fsync file sinks after every message. Defaults to false. */
  readonly fsync?: boolean
}

function isStdStream(value: string): value is StdStream {
  return value === 'stdout' || value === 'stderr'
}

export class DefaultMessageWriter implements MessageWriter {
  constructor(private readonly options: DefaultMessageWriterOptions = {}) {}

  /**
   * @throws ChannelOpenError if params name no usable sink or it cannot be opened
   */
  open(params: Params): MessageWriterChannel {
    const fsync = this.options.fsync ?? false

    if (MESSAGES_PATH_KEY in params) {
      const path = params[MESSAGES_PATH_KEY]
      if (typeof path !== 'string' || path === '') {
        throw new ChannelOpenError(`"${MESSAGES_PATH_KEY}" must be a non-empty string`)
      }
      const mode = params[MESSAGES_MODE_KEY] ?? 'append'
      if (mode === 'append') {
        return new FileChannel(path, fsync)
      }
      if (mode === 'replace') {
        return new ReplaceFileChannel(path, fsync)
      }
      throw new ChannelOpenError(
        `"${MESSAGES_MODE_KEY}" must be "append" or "replace", got ${JSON.stringify(mode)}`
      )
    }

    if (MESSAGES_STDIO_KEY in params) {
      const stream = params[MESSAGES_STDIO_KEY]
      const normalized = typeof stream === 'string' ? stream.toLowerCase() : ''
      if (!isStdStream(normalized)) {
        throw new ChannelOpenError(
          `"${MESSAGES_STDIO_KEY}" must be "stdout" or "stderr", got ${JSON.stringify(stream)}`
        )
      }
      return new StreamChannel(normalized)
    }

    throw new ChannelOpenError(
      `messages params must contain "${MESSAGES_PATH_KEY}" or "${MESSAGES_STDIO_KEY}"`
    )
  }
}
