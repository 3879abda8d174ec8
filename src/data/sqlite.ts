/**
 * SQLite table loading with better-sqlite3. The database is opened
 * read-only for each call and closed before returning.
 *
 * @module data/sqlite
 */

import Database from 'better-sqlite3'
import { parseError } from '../types/common.js'
import type { Dataset, Row, Scalar } from './dataset.js'

type TableInfo = { cid: number; name: string }

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null
  // INTEGER columns are read as bigint; only values a double holds exactly become numbers
  if (typeof value === 'bigint') {
    return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  // BLOB columns
  if (Buffer.isBuffer(value)) return value.toString('base64')
  return String(value)
}

function withDatabase<T>(file: string, run: (db: Database.Database) => T): T {
  let db: Database.Database
  try {
    db = new Database(file, { readonly: true, fileMustExist: true })
  } catch (err) {
    throw parseError(`cannot open database ${file}: ${err instanceof Error ? err.message : String(err)}`)
  }
  try {
    return run(db)
  } catch (err) {
    if (err instanceof Error && err.name === 'SqliteError') {
      throw parseError(err.message)
    }
    throw err
  } finally {
    db.close()
  }
}

function tableNames(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    )
    .all()
    .map((row) => row.name)
}

/**
 * List the user tables of a database file, sorted by name.
 *
 * @throws {@link import('../types/common.js').ParseError} when the file is missing or not a database.
 */
export function listTables(file: string): string[] {
  return withDatabase(file, tableNames)
}

/**
 * Read every row of one table, in storage order, into a {@link Dataset}.
 * Columns follow the table's declared order. Integers outside the range a
 * `number` holds exactly are kept as `bigint`.
 *
 * @throws {@link import('../types/common.js').ParseError} when the table does not exist.
 */
export function loadTable(file: string, table: string): Dataset {
  return withDatabase(file, (db) => {
    if (!tableNames(db).includes(table)) {
      throw parseError(`no such table: ${table}`)
    }

    const quoted = quoteIdentifier(table)
    const columns = db
      .prepare<[], TableInfo>(`PRAGMA table_info(${quoted})`)
      .all()
      .sort((a, b) => a.cid - b.cid)
      .map((info) => info.name)

    const records = db
      .prepare<[], Record<string, unknown>>(`SELECT * FROM ${quoted}`)
      .safeIntegers(true)
      .all()
    const rows = records.map(
      (record): Row =>
        Object.fromEntries(columns.map((column): [string, Scalar] => [column, toScalar(record[column])])),
    )

    return { source: { kind: 'table', file, table }, columns, rows }
  })
}
