/**
 * Test harness exports.
 */

export { createContextData } from './context-data'
export type { FakeChannelOptions } from './fake-channel'
export { FakeChannel } from './fake-channel'
export type {
  FakeStrategies,
  FakeStrategiesOptions,
  OpenedFakeSession,
  StrategyCall
} from './fake-strategies'
export { createFakeStrategies, openFakeSession } from './fake-strategies'
