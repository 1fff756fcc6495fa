/**
 * Writer module: channels and the default message writer.
 *
 * @module
 */

export {
  FileChannel,
  LineChannel,
  ReplaceFileChannel,
  type StdStream,
  StreamChannel
} from './channel.js'
export {
  DefaultMessageWriter,
  type DefaultMessageWriterOptions,
  MESSAGES_MODE_KEY,
  MESSAGES_PATH_KEY,
  MESSAGES_STDIO_KEY
} from './message-writer.js'
