/**
 * Batch upload: one create call per dataset row, strictly in row order.
 *
 * @module uploader
 */

import type { CollectionResource } from './resource.js'
import type { Dataset, Row, Scalar } from './data/dataset.js'
import type { FieldMapping } from './mapping-store.js'
import type { JsonObject, JsonValue } from './types/json.js'
import { sanitizeSlug } from './slug.js'

/** Final counts of a batch run. */
export type UploadResult = {
  succeeded: number
  failed: number
}

export type BatchUploadOptions = {
  dataset: Dataset
  mapping: FieldMapping
  /** Collection the rows are created in. */
  items: Pick<CollectionResource, 'create'>
  /** Called after every row with the fraction of rows processed, in `(0, 1]`. */
  onProgress?: (fraction: number, processed: number, total: number) => void
  /** Called for each row whose create call failed. */
  onRowError?: (rowIndex: number, error: unknown) => void
  /** Called for each row created. */
  onRowSuccess?: (rowIndex: number, created: JsonValue) => void
}

function toJson(value: Scalar | undefined): JsonValue {
  if (value === undefined) return null
  if (typeof value === 'bigint') return value.toString()
  return value
}

/**
 * Build the create payload for one row: exactly the mapped destination fields,
 * each taken from its source column. A mapped column the row lacks yields `null`.
 * A `slug` value is passed through {@link sanitizeSlug}.
 */
export function buildPayload(row: Row, mapping: FieldMapping): JsonObject {
  const payload: JsonObject = Object.fromEntries(
    Object.entries(mapping).map(([field, column]): [string, JsonValue] => [
      field,
      toJson(Object.hasOwn(row, column) ? row[column] : undefined),
    ]),
  )

  const slug = payload['slug']
  if (slug !== undefined && slug !== null) {
    payload['slug'] = sanitizeSlug(String(slug))
  }

  return payload
}

/** Payloads of the first `limit` rows, for preview before uploading. */
export function previewPayloads(dataset: Dataset, mapping: FieldMapping, limit = 5): JsonObject[] {
  return dataset.rows.slice(0, limit).map((row) => buildPayload(row, mapping))
}

/**
 * Submit every row of `dataset` as a new item, one awaited call at a time.
 *
 * A failed row is counted and reported through `onRowError`; it never stops
 * the batch. There is no retry.
 */
export async function runBatchUpload(options: BatchUploadOptions): Promise<UploadResult> {
  const { dataset, mapping, items, onProgress, onRowError, onRowSuccess } = options
  const total = dataset.rows.length
  const result: UploadResult = { succeeded: 0, failed: 0 }

  for (let index = 0; index < total; index++) {
    const payload = buildPayload(dataset.rows[index], mapping)
    try {
      const created = await items.create(payload)
      result.succeeded++
      onRowSuccess?.(index, created)
    } catch (err) {
      result.failed++
      onRowError?.(index, err)
    }
    onProgress?.((index + 1) / total, index + 1, total)
  }

  return result
}
