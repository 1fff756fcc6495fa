/**
 * Message writer channels: where newline-delimited JSON messages go.
 *
 * Every write is synchronous. A message is handed to the OS before
 * writeMessage() returns, so a reader tailing the sink sees each message
 * promptly, and a killed process leaves a prefix of whole lines.
 *
 * @remarks
 * **Single-writer assumption**: channels are NOT safe for concurrent use.
 * The session owns its channel exclusively.
 *
 * @module
 */
import { closeSync, fsyncSync, openSync, renameSync, writeSync } from 'node:fs'
import {
  ChannelOpenError,
  type ClosedParams,
  createMessage,
  encodeMessageLine,
  errorMessage,
  type MessageWriterChannel,
  type PipesMessage,
  WriteError
} from '@pipes-protocol/sdk'

/**
 * Standard streams a stream channel can write to.
 */
export type StdStream = 'stdout' | 'stderr'

/**
 * Write every byte of `data` to `fd`, looping over short writes.
 * Any error, EAGAIN from a full non-blocking pipe included, is thrown.
 */
function writeFully(fd: number, data: Buffer): void {
  let offset = 0
  while (offset < data.length) {
    offset += writeSync(fd, data, offset, data.length - offset)
  }
}

/**
 * Base channel: serializes messages to lines and owns the close protocol.
 * Subclasses provide the line sink and the handle release.
 */
export abstract class LineChannel implements MessageWriterChannel {
  private released = false

  /**
   * @throws WriteError if the channel is closed or the write fails
   */
  writeMessage(message: PipesMessage): void {
    if (this.released) {
      throw new WriteError(`Cannot write ${message.method} message: channel is closed`)
    }
    this.writeLine(encodeMessageLine(message))
  }

  /**
   * Write the closed sentinel, then release the handle. The handle is
   * released even when the sentinel write fails.
   *
   * @throws WriteError if the sentinel write or the release fails
   */
  close(params: ClosedParams = {}): void {
    if (this.released) {
      throw new WriteError('Cannot close: channel is already closed')
    }

    let writeFailure: unknown = null
    try {
      this.writeLine(encodeMessageLine(createMessage('closed', params)))
    } catch (err) {
      writeFailure = err
    }
    this.released = true

    let releaseFailure: unknown = null
    try {
      this.release()
    } catch (err) {
      releaseFailure = err
    }

    if (writeFailure !== null && releaseFailure !== null) {
      throw new WriteError('Failed to write closed message and release the channel', {
        cause: new AggregateError([writeFailure, releaseFailure])
      })
    }
    if (writeFailure !== null) {
      throw writeFailure
    }
    if (releaseFailure !== null) {
      throw new WriteError(`Failed to release channel: ${errorMessage(releaseFailure)}`, {
        cause: releaseFailure
      })
    }
  }

  /**
   * Write one complete line. Must not return before the line is handed to the OS.
   * @throws WriteError on failure
   */
  protected abstract writeLine(line: string): void

  /** Release the underlying handle. Called exactly once. */
  protected abstract release(): void
}

function openForAppend(path: string): number {
  try {
    return openSync(path, 'a')
  } catch (err) {
    throw new ChannelOpenError(`Cannot open message file "${path}": ${errorMessage(err)}`, {
      cause: err
    })
  }
}

/**
 * Appends lines to a file. The file is created if missing and held open
 * until close().
 */
export class FileChannel extends LineChannel {
  private readonly fd: number

  /**
   * @param path - Sink file path
   * @param fsync - fsync after every line
   * @throws ChannelOpenError if the file cannot be opened for appending
   */
  constructor(
    readonly path: string,
    private readonly fsync: boolean = false
  ) {
    super()
    this.fd = openForAppend(path)
  }

  protected writeLine(line: string): void {
    try {
      writeFully(this.fd, Buffer.from(line, 'utf-8'))
      if (this.fsync) {
        fsyncSync(this.fd)
      }
    } catch (err) {
      throw new WriteError(`Failed to write to "${this.path}": ${errorMessage(err)}`, {
        cause: err
      })
    }
  }

  protected release(): void {
    closeSync(this.fd)
  }
}

/**
 * Replaces the target file atomically (temp file + rename) on open and
 * after every line, so a reader only ever observes complete files.
 *
 * Holds the content written so far: each replace rewrites all of it.
 */
export class ReplaceFileChannel extends LineChannel {
  private content = ''
  private readonly tempPath: string

  /**
   * @param path - Sink file path; replaced with an empty file on open
   * @param fsync - fsync the temp file before each rename
   * @throws ChannelOpenError if the target cannot be created
   */
  constructor(
    readonly path: string,
    private readonly fsync: boolean = false
  ) {
    super()
    this.tempPath = `${path}.${process.pid}.tmp`
    try {
      this.replace('')
    } catch (err) {
      throw new ChannelOpenError(`Cannot create message file "${path}": ${errorMessage(err)}`, {
        cause: err
      })
    }
  }

  protected writeLine(line: string): void {
    const next = this.content + line
    try {
      this.replace(next)
    } catch (err) {
      throw new WriteError(`Failed to replace "${this.path}": ${errorMessage(err)}`, {
        cause: err
      })
    }
    this.content = next
  }

  protected release(): void {
    this.content = ''
  }

  private replace(content: string): void {
    const fd = openSync(this.tempPath, 'w')
    try {
      writeFully(fd, Buffer.from(content, 'utf-8'))
      if (this.fsync) {
        fsyncSync(fd)
      }
    } finally {
      closeSync(fd)
    }
    renameSync(this.tempPath, this.path)
  }
}

/**
 * Writes lines to a standard stream's file descriptor, bypassing the
 * buffered process.stdout / process.stderr streams.
 */
export class StreamChannel extends LineChannel {
  private readonly fd: number

  /**
   * @param stream - Target stream
   * @param fd - Descriptor to write to instead of the stream's own (1 or 2)
   */
  constructor(
    readonly stream: StdStream,
    fd?: number
  ) {
    super()
    this.fd = fd ?? (stream === 'stdout' ? 1 : 2)
  }

  protected writeLine(line: string): void {
    try {
      writeFully(this.fd, Buffer.from(line, 'utf-8'))
    } catch (err) {
      throw new WriteError(`Failed to write to ${this.stream}: ${errorMessage(err)}`, {
        cause: err
      })
    }
  }

  protected release(): void {
    // Standard descriptors belong to the process; nothing to release.
  }
}
