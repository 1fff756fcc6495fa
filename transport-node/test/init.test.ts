import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  ChannelOpenError,
  type MessageWriter,
  type MessageWriterChannel,
  ParamsError,
  UsageError
} from '@pipes-protocol/sdk'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { init, withSession } from '../src/init.js'
import { encodeParams } from '../src/params.js'
import { EnvParamsLoader } from '../src/params-loader.js'

const CLOSED_LINE = '{"method":"closed","params":{}}'

describe('init() and withSession()', () => {
  let dir: string
  let contextPath: string
  let messagesPath: string
  let contextValue: string
  let messagesValue: string
  let env: NodeJS.ProcessEnv

  /**
   * Read the message file as lines, checking it ends in a newline.
   */
  function readLines(): string[] {
    const text = readFileSync(messagesPath, 'utf-8')
    expect(text.endsWith('\n')).toBe(true)
    return text.slice(0, -1).split('\n')
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pipes-init-'))
    contextPath = join(dir, 'context.json')
    messagesPath = join(dir, 'messages.jsonl')
    writeFileSync(contextPath, '{"run_id":"abc","asset_keys":["a"],"extras":{}}')
    contextValue = encodeParams({ path: contextPath })
    messagesValue = encodeParams({ path: messagesPath })
    env = { PIPES_CONTEXT: contextValue, PIPES_MESSAGES: messagesValue }
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    rmSync(dir, { recursive: true, force: true })
  })

  it('writes a materialization followed by closed', () => {
    const session = init({ paramsLoader: new EnvParamsLoader({ env }), exitHook: false })

    expect(session.context.run_id).toBe('abc')
    session.reportAssetMaterialization({ metadata: { rows: 42 } })
    session.close()

    expect(readLines()).toEqual([
      '{"method":"report_asset_materialization","params":{"metadata":{"rows":42},"asset_key":"a"}}',
      CLOSED_LINE
    ])
  })

  it('reads the process environment by default', () => {
    vi.stubEnv('PIPES_CONTEXT', contextValue)
    vi.stubEnv('PIPES_MESSAGES', messagesValue)

    const session = init({ exitHook: false })
    session.info('from the environment')
    session.close()

    expect(readLines()).toEqual([
      '{"method":"log","params":{"message":"from the environment","level":"INFO"}}',
      CLOSED_LINE
    ])
  })

  it('fails with ParamsError and writes nothing when a variable is missing', () => {
    const loader = new EnvParamsLoader({ env: { PIPES_CONTEXT: contextValue } })

    expect(() => init({ paramsLoader: loader, exitHook: false })).toThrow(ParamsError)
    expect(() => readFileSync(messagesPath)).toThrow('ENOENT')
  })

  it('fails with ChannelOpenError when the sink cannot be opened', () => {
    const loader = new EnvParamsLoader({
      env: { ...env, PIPES_MESSAGES: encodeParams({ path: join(dir, 'nope', 'm.jsonl') }) }
    })

    expect(() => init({ paramsLoader: loader, exitHook: false })).toThrow(ChannelOpenError)

    // Nothing was retained: a valid init succeeds afterwards
    init({ paramsLoader: new EnvParamsLoader({ env }), exitHook: false }).close()
  })

  it('allows only one session at a time', () => {
    const paramsLoader = new EnvParamsLoader({ env })
    const session = init({ paramsLoader, exitHook: false })

    expect(() => init({ paramsLoader, exitHook: false })).toThrow(UsageError)

    session.close()
    expect(readLines()).toEqual([CLOSED_LINE])
  })

  it('withSession() returns the result and closes cleanly', async () => {
    const result = await withSession(
      async (session) => {
        session.reportAssetCheck({ check_name: 'row_count', passed: true })
        return 'done'
      },
      { paramsLoader: new EnvParamsLoader({ env }), exitHook: false }
    )

    expect(result).toBe('done')
    expect(readLines()).toEqual([
      '{"method":"report_asset_check","params":{"asset_key":"a","check_name":"row_count","passed":true,"severity":"ERROR","metadata":{}}}',
      CLOSED_LINE
    ])
  })

  it('withSession() records the error in closed and rethrows it', async () => {
    const failure = new RangeError('row out of range')

    await expect(
      withSession(
        () => {
          throw failure
        },
        { paramsLoader: new EnvParamsLoader({ env }), exitHook: false }
      )
    ).rejects.toBe(failure)

    const lines = readLines()
    expect(lines).toHaveLength(1)
    const closed: unknown = JSON.parse(lines[0] ?? '')
    expect(closed).toMatchObject({
      method: 'closed',
      params: { exception: { name: 'RangeError', message: 'row out of range' } }
    })
  })

  it('withSession() throws both errors when close fails during a failure', async () => {
    const channel: MessageWriterChannel = {
      writeMessage: () => undefined,
      close: () => {
        throw new Error('EPIPE')
      }
    }
    const messageWriter: MessageWriter = { open: () => channel }
    const failure = new Error('job failed')

    const rejection = withSession(() => Promise.reject(failure), {
      paramsLoader: new EnvParamsLoader({ env }),
      messageWriter,
      exitHook: false
    })

    await expect(rejection).rejects.toBeInstanceOf(AggregateError)
    await expect(rejection).rejects.toMatchObject({
      message: 'Session failed and could not be closed',
      errors: [
        failure,
        expect.objectContaining({ message: 'Failed to write closed message: EPIPE' })
      ]
    })

    // The failed close still released the session
    init({ paramsLoader: new EnvParamsLoader({ env }), exitHook: false }).close()
  })

  it('withSession() propagates an init failure without calling fn', async () => {
    const fn = vi.fn()

    await expect(
      withSession(fn, { paramsLoader: new EnvParamsLoader({ env: {} }), exitHook: false })
    ).rejects.toThrow('PIPES_CONTEXT: is not set')
    expect(fn).not.toHaveBeenCalled()
  })
})
