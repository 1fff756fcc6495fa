/**
 * Type-level contract tests for the session API.
 *
 * Uses tsd for compile-time type assertions.
 */
import { expectAssignable, expectNotAssignable, expectType } from 'tsd'
import type { PipesContext } from '../../src/context'
import type {
  LogOptions,
  ReportAssetCheckOptions,
  ReportAssetMaterializationOptions,
  SessionAPI,
  SessionState
} from '../../src/session'
import type { JsonValue } from '../../src/types/params'

declare const session: SessionAPI

// Reporting methods are synchronous
expectType<void>(session.reportAssetMaterialization())
expectType<void>(session.reportAssetMaterialization({ metadata: { rows: 42 } }))
expectType<void>(session.reportAssetCheck({ check_name: 'not_empty', passed: true }))
expectType<void>(session.log({ level: 'INFO', message: 'hello' }))
expectType<void>(session.warning('careful'))
expectType<void>(session.close())
expectType<void>(session.close(new Error('failed')))

expectType<PipesContext>(session.context)
expectType<SessionState>(session.state)
expectType<boolean>(session.isClosed)

// Context accessors
expectType<string>(session.context.getAssetKey())
expectType<string | null>(session.context.getCodeVersion('orders'))
expectType<JsonValue>(session.context.getExtra('batch'))
expectType<readonly string[]>(session.context.asset_keys)

// Options shapes
expectAssignable<ReportAssetMaterializationOptions>({})
expectAssignable<ReportAssetMaterializationOptions>({ asset_key: 'orders', data_version: 'v1' })
expectNotAssignable<ReportAssetMaterializationOptions>({ metadata: { when: new Date() } })

expectAssignable<ReportAssetCheckOptions>({ check_name: 'c', passed: false, severity: 'WARN' })
expectNotAssignable<ReportAssetCheckOptions>({ check_name: 'c', passed: false, severity: 'INFO' })
expectNotAssignable<ReportAssetCheckOptions>({ check_name: 'c' })

expectAssignable<LogOptions>({ level: 'CRITICAL', message: 'm' })
expectNotAssignable<LogOptions>({ level: 'info', message: 'm' })
