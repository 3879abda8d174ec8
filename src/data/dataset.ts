/**
 * Tabular dataset shape shared by the CSV and SQLite loaders, and the holder
 * that keeps exactly one of them active.
 *
 * @module data/dataset
 */

/** A single cell value. CSV cells are always strings. */
export type Scalar = string | number | bigint | boolean | null

/** Column name → cell value. */
export type Row = Record<string, Scalar>

/** Where a dataset was loaded from. */
export type DatasetSource =
  | { kind: 'csv'; name: string }
  | { kind: 'table'; file: string; table: string }

/**
 * Ordered rows of named columns. Column names are unique and every row
 * carries a key for every column.
 */
export type Dataset = {
  source: DatasetSource
  columns: string[]
  rows: Row[]
}

/**
 * Holds the active dataset. Loading a new source replaces the previous
 * dataset in full; rows are never merged across sources.
 */
export class DatasetHolder {
  private active: Dataset | null = null

  /** The active dataset, or `null` before anything was loaded. */
  current(): Dataset | null {
    return this.active
  }

  /** Make `dataset` the active one, discarding whatever was loaded before. */
  replace(dataset: Dataset): Dataset {
    this.active = dataset
    return dataset
  }

  clear(): void {
    this.active = null
  }
}

/** Short label for status lines, e.g. `books.csv` or `library.db:authors`. */
export function describeSource(source: DatasetSource): string {
  return source.kind === 'csv' ? source.name : `${source.file}:${source.table}`
}
