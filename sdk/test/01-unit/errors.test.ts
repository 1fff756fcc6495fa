/**
 * Unit tests for the error taxonomy.
 */
import { describe, expect, it } from 'vitest'
import {
  ChannelOpenError,
  ContextDecodeError,
  errorMessage,
  ParamsError,
  PipesError,
  UsageError,
  WriteError
} from '../../src/errors'

describe('error taxonomy', () => {
  it('every error is a PipesError with its own name', () => {
    const errors = [
      new ParamsError('is not set'),
      new ContextDecodeError('is required'),
      new ChannelOpenError('no sink'),
      new WriteError('disk full'),
      new UsageError('closed')
    ]

    expect(errors.map((e) => e.name)).toEqual([
      'ParamsError',
      'ContextDecodeError',
      'ChannelOpenError',
      'WriteError',
      'UsageError'
    ])
    for (const err of errors) {
      expect(err).toBeInstanceOf(PipesError)
      expect(err).toBeInstanceOf(Error)
    }
  })

  it('prefixes the params key', () => {
    const err = new ParamsError('is not set', 'PIPES_CONTEXT')

    expect(err.message).toBe('PIPES_CONTEXT: is not set')
    expect(err.key).toBe('PIPES_CONTEXT')
  })

  it('prefixes the context field', () => {
    const err = new ContextDecodeError('is required', 'run_id')

    expect(err.message).toBe('run_id: is required')
    expect(err.field).toBe('run_id')
  })

  it('keeps the cause', () => {
    const cause = new Error('EACCES')
    const err = new ChannelOpenError('Cannot open', { cause })

    expect(err.cause).toBe(cause)
  })
})

describe('errorMessage()', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(errorMessage(new Error('x'))).toBe('x')
    expect(errorMessage('y')).toBe('y')
    expect(errorMessage(undefined)).toBe('undefined')
  })
})
