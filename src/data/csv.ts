/**
 * CSV loading with papaparse. The first record is the header row.
 *
 * @module data/csv
 */

import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import Papa from 'papaparse'
import { isMissingFile, notFoundError, parseError } from '../types/common.js'
import type { Dataset, Row } from './dataset.js'

/**
 * Parse CSV text into a {@link Dataset}.
 *
 * @param text - Comma-separated text with a header row.
 * @param name - Label recorded as the dataset's source.
 * @throws {@link import('../types/common.js').ParseError} on any malformed record,
 * a missing header row, or an empty or repeated column name. No partial dataset is returned.
 */
export function parseCsv(text: string, name: string): Dataset {
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text

  const result = Papa.parse<string[]>(source, {
    header: false,
    delimiter: ',',
    skipEmptyLines: true,
  })

  if (result.errors.length > 0) {
    const first = result.errors[0]
    throw parseError(first.message, first.row)
  }

  const [columns, ...records] = result.data
  if (columns === undefined) {
    throw parseError('missing header row')
  }

  const seen = new Set<string>()
  for (const column of columns) {
    if (column.trim() === '') throw parseError('empty column name in header row')
    if (seen.has(column)) throw parseError(`duplicate column name "${column}"`)
    seen.add(column)
  }

  const rows = records.map((record, index): Row => {
    if (record.length !== columns.length) {
      throw parseError(`expected ${columns.length} fields but found ${record.length}`, index)
    }
    return Object.fromEntries(columns.map((column, position): [string, string] => [column, record[position]]))
  })

  return { source: { kind: 'csv', name }, columns, rows }
}

/**
 * Read and parse a CSV file (UTF-8).
 *
 * @param path - File to read.
 * @throws {@link import('../types/common.js').NotFoundError} when `path` does not exist.
 */
export async function loadCsvFile(path: string): Promise<Dataset> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    if (isMissingFile(err)) throw notFoundError(path)
    throw err
  }
  return parseCsv(text, basename(path))
}
