import type { JsonObject } from './params'

/**
 * Inclusive range of partition keys.
 */
export type PartitionKeyRange = {
  readonly start: string
  readonly end: string
}

/**
 * Time window covered by a time-partitioned run, as ISO 8601 strings.
 */
export type PartitionTimeWindow = {
  readonly start: string
  readonly end: string
}

/**
 * Provenance of the last materialization of an asset.
 */
export type ProvenanceData = {
  readonly code_version: string
  readonly input_data_versions: Readonly<Record<string, string>>
  readonly is_user_provided: boolean
}

/**
 * Run context as supplied by the launcher.
 * Field names match the wire schema.
 */
export type PipesContextData = {
  /** Canonical run identifier */
  readonly run_id: string
  /** Name of the invoking job, when known */
  readonly job_name?: string
  /** Asset keys this invocation is responsible for. May be empty. */
  readonly asset_keys: readonly string[]
  /** Partition this run is responsible for, when the job is partitioned */
  readonly partition_key?: string
  readonly partition_key_range?: PartitionKeyRange
  readonly partition_time_window?: PartitionTimeWindow
  /** Code version tag of the invoking deployment */
  readonly code_version_tag?: string
  readonly code_version_by_asset_key?: Readonly<Record<string, string | null>>
  readonly provenance_by_asset_key?: Readonly<Record<string, ProvenanceData | null>>
  /** Retry number, 0 for the first attempt */
  readonly retry_number: number
  /** Launcher-supplied custom data */
  readonly extras: JsonObject
}
