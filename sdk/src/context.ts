/**
 * Run context decoding and the read-only context object handed to user code.
 *
 * Decoding is all-or-nothing: either every field validates and a frozen
 * PipesContext is built, or ContextDecodeError is thrown and no value exists.
 *
 * Optional fields may be absent or `null` on the wire; both mean "not set".
 *
 * @module
 */
import { ContextDecodeError, UsageError } from './errors'
import type {
  PartitionKeyRange,
  PartitionTimeWindow,
  PipesContextData,
  ProvenanceData
} from './types/context'
import { deepFreeze, isJsonObject, type JsonObject, type JsonValue } from './types/params'

function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null
}

function optionalString(obj: JsonObject, field: string): string | undefined {
  const value = obj[field]
  if (isAbsent(value)) return undefined
  if (typeof value !== 'string') {
    throw new ContextDecodeError(`must be a string, got ${describeType(value)}`, field)
  }
  return value
}

function requireStringField(obj: JsonObject, field: string, parent: string): string {
  const value = obj[field]
  if (typeof value !== 'string') {
    throw new ContextDecodeError(`must be a string, got ${describeType(value)}`, `${parent}.${field}`)
  }
  return value
}

function optionalObject(obj: JsonObject, field: string): JsonObject | undefined {
  const value = obj[field]
  if (isAbsent(value)) return undefined
  if (!isJsonObject(value)) {
    throw new ContextDecodeError(`must be an object, got ${describeType(value)}`, field)
  }
  return value
}

function decodeAssetKeys(obj: JsonObject): string[] {
  const value = obj.asset_keys
  if (isAbsent(value)) {
    throw new ContextDecodeError('is required', 'asset_keys')
  }
  if (!Array.isArray(value)) {
    throw new ContextDecodeError(`must be an array, got ${describeType(value)}`, 'asset_keys')
  }
  return value.map((key, index) => {
    if (typeof key !== 'string' || key === '') {
      throw new ContextDecodeError('must be a non-empty string', `asset_keys[${index}]`)
    }
    return key
  })
}

function decodeRetryNumber(obj: JsonObject): number {
  const value = obj.retry_number
  if (isAbsent(value)) return 0
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ContextDecodeError('must be a non-negative integer', 'retry_number')
  }
  return value
}

function decodeRange(obj: JsonObject, field: string): { start: string; end: string } | undefined {
  const value = optionalObject(obj, field)
  if (value === undefined) return undefined
  return {
    start: requireStringField(value, 'start', field),
    end: requireStringField(value, 'end', field)
  }
}

function decodeCodeVersions(obj: JsonObject): Record<string, string | null> | undefined {
  const field = 'code_version_by_asset_key'
  const value = optionalObject(obj, field)
  if (value === undefined) return undefined

  const result: Record<string, string | null> = {}
  for (const [assetKey, version] of Object.entries(value)) {
    if (version !== null && typeof version !== 'string') {
      throw new ContextDecodeError('must be a string or null', `${field}.${assetKey}`)
    }
    result[assetKey] = version
  }
  return result
}

function decodeProvenance(value: JsonValue, path: string): ProvenanceData | null {
  if (value === null) return null
  if (!isJsonObject(value)) {
    throw new ContextDecodeError(`must be an object or null, got ${describeType(value)}`, path)
  }

  const inputs = value.input_data_versions
  if (!isJsonObject(inputs)) {
    throw new ContextDecodeError('must be an object', `${path}.input_data_versions`)
  }
  const input_data_versions: Record<string, string> = {}
  for (const [inputKey, version] of Object.entries(inputs)) {
    if (typeof version !== 'string') {
      throw new ContextDecodeError('must be a string', `${path}.input_data_versions.${inputKey}`)
    }
    input_data_versions[inputKey] = version
  }

  const is_user_provided = value.is_user_provided
  if (typeof is_user_provided !== 'boolean') {
    throw new ContextDecodeError('must be a boolean', `${path}.is_user_provided`)
  }

  return {
    code_version: requireStringField(value, 'code_version', path),
    input_data_versions,
    is_user_provided
  }
}

function decodeProvenanceMap(
  obj: JsonObject
): Record<string, ProvenanceData | null> | undefined {
  const field = 'provenance_by_asset_key'
  const value = optionalObject(obj, field)
  if (value === undefined) return undefined

  const result: Record<string, ProvenanceData | null> = {}
  for (const [assetKey, provenance] of Object.entries(value)) {
    result[assetKey] = decodeProvenance(provenance, `${field}.${assetKey}`)
  }
  return result
}

/**
 * Validate raw context JSON against the context schema.
 *
 * @param value - Parsed context JSON
 * @returns Validated context data (fresh objects, no aliasing of the input)
 * @throws ContextDecodeError if a required field is missing or any field is mistyped
 */
export function decodeContextData(value: unknown): PipesContextData {
  if (!isJsonObject(value)) {
    throw new ContextDecodeError(`context must be a JSON object, got ${describeType(value)}`)
  }

  const run_id = value.run_id
  if (typeof run_id !== 'string' || run_id === '') {
    throw new ContextDecodeError(
      isAbsent(run_id) ? 'is required' : 'must be a non-empty string',
      'run_id'
    )
  }

  const asset_keys = decodeAssetKeys(value)
  const job_name = optionalString(value, 'job_name')
  const partition_key = optionalString(value, 'partition_key')
  const code_version_tag = optionalString(value, 'code_version_tag')
  const partition_key_range = decodeRange(value, 'partition_key_range')
  const partition_time_window = decodeRange(value, 'partition_time_window')
  const code_version_by_asset_key = decodeCodeVersions(value)
  const provenance_by_asset_key = decodeProvenanceMap(value)
  const retry_number = decodeRetryNumber(value)
  const extras = optionalObject(value, 'extras') ?? {}

  return {
    run_id,
    asset_keys,
    retry_number,
    extras: structuredClone(extras),
    ...(job_name !== undefined && { job_name }),
    ...(partition_key !== undefined && { partition_key }),
    ...(partition_key_range !== undefined && { partition_key_range }),
    ...(partition_time_window !== undefined && { partition_time_window }),
    ...(code_version_tag !== undefined && { code_version_tag }),
    ...(code_version_by_asset_key !== undefined && { code_version_by_asset_key }),
    ...(provenance_by_asset_key !== undefined && { provenance_by_asset_key })
  }
}

/**
 * Read-only run context.
 *
 * Built exactly once per session. The instance and everything reachable
 * from it are frozen.
 */
export class PipesContext implements PipesContextData {
  readonly run_id: string
  readonly job_name?: string
  readonly asset_keys: readonly string[]
  readonly partition_key?: string
  readonly partition_key_range?: PartitionKeyRange
  readonly partition_time_window?: PartitionTimeWindow
  readonly code_version_tag?: string
  readonly code_version_by_asset_key?: Readonly<Record<string, string | null>>
  readonly provenance_by_asset_key?: Readonly<Record<string, ProvenanceData | null>>
  readonly retry_number: number
  readonly extras: JsonObject

  constructor(data: PipesContextData) {
    this.run_id = data.run_id
    this.asset_keys = deepFreeze([...data.asset_keys])
    this.retry_number = data.retry_number
    this.extras = deepFreeze(structuredClone(data.extras))
    if (data.job_name !== undefined) this.job_name = data.job_name
    if (data.partition_key !== undefined) this.partition_key = data.partition_key
    if (data.partition_key_range !== undefined) {
      this.partition_key_range = deepFreeze({ ...data.partition_key_range })
    }
    if (data.partition_time_window !== undefined) {
      this.partition_time_window = deepFreeze({ ...data.partition_time_window })
    }
    if (data.code_version_tag !== undefined) this.code_version_tag = data.code_version_tag
    if (data.code_version_by_asset_key !== undefined) {
      this.code_version_by_asset_key = deepFreeze(structuredClone(data.code_version_by_asset_key))
    }
    if (data.provenance_by_asset_key !== undefined) {
      this.provenance_by_asset_key = deepFreeze(structuredClone(data.provenance_by_asset_key))
    }
    Object.freeze(this)
  }

  /** True if the run is responsible for at least one asset */
  get isAssetStep(): boolean {
    return this.asset_keys.length > 0
  }

  get hasPartitionKey(): boolean {
    return this.partition_key !== undefined
  }

  /**
   * The single asset key of this run.
   * @throws UsageError unless the run has exactly one asset key
   */
  getAssetKey(): string {
    const [assetKey, ...rest] = this.asset_keys
    if (assetKey === undefined || rest.length > 0) {
      throw new UsageError(
        `Run has ${this.asset_keys.length} asset keys; a single asset key is only defined for exactly one`
      )
    }
    return assetKey
  }

  /** @throws UsageError if the run is not partitioned */
  getPartitionKey(): string {
    if (this.partition_key === undefined) {
      throw new UsageError('Run has no partition key')
    }
    return this.partition_key
  }

  /** @throws UsageError if the run has no partition key range */
  getPartitionKeyRange(): PartitionKeyRange {
    if (this.partition_key_range === undefined) {
      throw new UsageError('Run has no partition key range')
    }
    return this.partition_key_range
  }

  /** @throws UsageError if the run has no partition time window */
  getPartitionTimeWindow(): PartitionTimeWindow {
    if (this.partition_time_window === undefined) {
      throw new UsageError('Run has no partition time window')
    }
    return this.partition_time_window
  }

  /**
   * Code version of an asset; null when the launcher knows the asset but
   * has no version for it.
   * @throws UsageError if no code version entry exists for the asset
   */
  getCodeVersion(assetKey: string): string | null {
    const versions = this.code_version_by_asset_key
    if (versions === undefined || !Object.hasOwn(versions, assetKey)) {
      throw new UsageError(`No code version entry for asset "${assetKey}"`)
    }
    return versions[assetKey] ?? null
  }

  /**
   * Provenance of the asset's last materialization; null when never materialized.
   * @throws UsageError if no provenance entry exists for the asset
   */
  getProvenance(assetKey: string): ProvenanceData | null {
    const provenance = this.provenance_by_asset_key
    if (provenance === undefined || !Object.hasOwn(provenance, assetKey)) {
      throw new UsageError(`No provenance entry for asset "${assetKey}"`)
    }
    return provenance[assetKey] ?? null
  }

  hasExtra(key: string): boolean {
    return Object.hasOwn(this.extras, key)
  }

  /** @throws UsageError if the launcher supplied no extra under `key` */
  getExtra(key: string): JsonValue {
    if (!this.hasExtra(key)) {
      throw new UsageError(`Extra "${key}" was not supplied by the launcher`)
    }
    return this.extras[key] ?? null
  }
}

/**
 * Decode raw context JSON into a frozen PipesContext.
 *
 * @throws ContextDecodeError if the value violates the context schema
 */
export function createContext(value: unknown): PipesContext {
  return new PipesContext(decodeContextData(value))
}
