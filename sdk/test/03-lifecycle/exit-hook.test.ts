/**
 * Tests for the process exit listener.
 *
 * Goal: Prove the listeners exist only while a session is open, that the
 * exit listener closes an open session, and that an uncaught exception is
 * recorded in that closed message.
 */
import { afterEach, describe, expect, it, vi } from 'vitest'
import { openFakeSession } from '../_harness'

/**
 * Run the exit listeners registered since `before` was taken, without
 * emitting 'exit' to the listeners the test runner owns.
 */
function runAddedExitListeners(before: readonly NodeJS.ExitListener[], code: number): void {
  for (const listener of process.listeners('exit')) {
    if (!before.includes(listener)) {
      listener(code)
    }
  }
}

/**
 * Deliver an uncaught exception to the monitor listeners registered since
 * `before` was taken.
 */
function runAddedMonitorListeners(
  before: readonly NodeJS.UncaughtExceptionListener[],
  error: Error
): void {
  for (const listener of process.listeners('uncaughtExceptionMonitor')) {
    if (!before.includes(listener)) {
      listener(error, 'uncaughtException')
    }
  }
}

describe('exit hook', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('registers one exit listener while open and removes it on close', () => {
    const before = process.listenerCount('exit')

    const { session } = openFakeSession({ exitHook: true })
    expect(process.listenerCount('exit')).toBe(before + 1)

    session.close()
    expect(process.listenerCount('exit')).toBe(before)
  })

  it('registers nothing when disabled', () => {
    const before = process.listenerCount('exit')

    const { session } = openFakeSession({ exitHook: false })
    expect(process.listenerCount('exit')).toBe(before)

    session.close()
  })

  it('closes an open session when the process exits', () => {
    const before = process.listeners('exit')
    const { session, channel } = openFakeSession({ exitHook: true })
    session.info('working')

    runAddedExitListeners(before, 0)

    expect(session.isClosed).toBe(true)
    expect(channel.methods).toEqual(['log', 'closed'])
    expect(process.listeners('exit')).toEqual(before)
  })

  it('reports a failed close on stderr', () => {
    const before = process.listeners('exit')
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const { session } = openFakeSession({
      exitHook: true,
      channel: { failOnClose: true, failureError: new Error('EPIPE') }
    })

    runAddedExitListeners(before, 1)

    expect(session.isClosed).toBe(true)
    expect(stderr).toHaveBeenCalledWith(
      '[pipes] failed to close session on exit: Failed to write closed message: EPIPE\n'
    )
  })

  it('holds one uncaught exception monitor while open', () => {
    const before = process.listenerCount('uncaughtExceptionMonitor')

    const { session } = openFakeSession({ exitHook: true })
    expect(process.listenerCount('uncaughtExceptionMonitor')).toBe(before + 1)

    session.close()
    expect(process.listenerCount('uncaughtExceptionMonitor')).toBe(before)
  })

  it('records an uncaught exception in the closed message', () => {
    const beforeExit = process.listeners('exit')
    const beforeMonitor = process.listeners('uncaughtExceptionMonitor')
    const { session, channel } = openFakeSession({ exitHook: true })
    const crash = new Error('job crashed')

    runAddedMonitorListeners(beforeMonitor, crash)
    runAddedExitListeners(beforeExit, 1)

    expect(session.isClosed).toBe(true)
    expect(channel.messages).toEqual([
      {
        method: 'closed',
        params: { exception: { name: 'Error', message: 'job crashed', stack: crash.stack } }
      }
    ])
    expect(process.listeners('uncaughtExceptionMonitor')).toEqual(beforeMonitor)
  })

  it('keeps the first uncaught exception', () => {
    const beforeExit = process.listeners('exit')
    const beforeMonitor = process.listeners('uncaughtExceptionMonitor')
    const { channel } = openFakeSession({ exitHook: true })

    runAddedMonitorListeners(beforeMonitor, new Error('first'))
    runAddedMonitorListeners(beforeMonitor, new Error('second'))
    runAddedExitListeners(beforeExit, 1)

    expect(channel.messages[0]?.params).toHaveProperty('exception.message', 'first')
  })
})
