/**
 * Persistence of the destination field → source column mapping as a small JSON file.
 *
 * @module mapping-store
 */

import { readFile, rename, writeFile } from 'node:fs/promises'
import { decodeError, isMissingFile, notFoundError } from './types/common.js'
import { isJsonObject } from './types/json.js'

/** Destination field name → source column name. */
export type FieldMapping = Record<string, string>

/** File the interactive session saves to unless configured otherwise. */
export const DEFAULT_MAPPING_FILE = 'mapping.json'

/**
 * Write `mapping` to `path` as a JSON object, replacing any existing file.
 * The content is written to a sibling temp file first and renamed into place.
 */
export async function saveMapping(mapping: FieldMapping, path: string): Promise<void> {
  const tmp = `${path}.tmp`
  await writeFile(tmp, JSON.stringify(mapping, null, 2) + '\n', 'utf8')
  await rename(tmp, path)
}

/**
 * Read a mapping saved by {@link saveMapping}. Entries are not checked against
 * any field list.
 *
 * @throws {@link import('./types/common.js').NotFoundError} when `path` does not exist.
 * @throws {@link import('./types/common.js').DecodeError} when the file is not a JSON object of strings.
 */
export async function loadMapping(path: string): Promise<FieldMapping> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    if (isMissingFile(err)) {
      throw notFoundError(path)
    }
    throw err
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw decodeError(err instanceof Error ? err.message : String(err), text.slice(0, 200))
  }

  if (!isJsonObject(parsed)) {
    throw decodeError(`${path} does not contain a JSON object`)
  }

  const entries = Object.entries(parsed).map(([field, column]): [string, string] => {
    if (typeof column !== 'string') {
      throw decodeError(`mapping for "${field}" is not a string`)
    }
    return [field, column]
  })
  return Object.fromEntries(entries)
}

/** Copy of `mapping` with `field` mapped to `column`, or unmapped when `column` is `null`. */
export function withMapping(mapping: FieldMapping, field: string, column: string | null): FieldMapping {
  const entries = Object.entries(mapping).filter(([existing]) => existing !== field)
  if (column !== null) entries.push([field, column])
  return Object.fromEntries(entries)
}
