/**
 * Interactive session state: the selected post type, the active dataset, and
 * the field mapping, plus the actions the CLI menu triggers on them.
 *
 * @module session
 */

import type { CmsClient } from './index.js'
import type { Logger } from './logger.js'
import type { PostType, PostTypeMap } from './types/post-types.js'
import type { CurrentUser } from './types/users.js'
import type { JsonObject } from './types/json.js'
import type { Dataset } from './data/dataset.js'
import type { FieldMapping } from './mapping-store.js'
import type { UploadResult } from './uploader.js'
import { PostTypeCache } from './cache.js'
import { DatasetHolder, describeSource } from './data/dataset.js'
import { loadCsvFile } from './data/csv.js'
import { listTables, loadTable } from './data/sqlite.js'
import { discoverFields } from './fields.js'
import { loadMapping, saveMapping, withMapping } from './mapping-store.js'
import { previewPayloads, runBatchUpload } from './uploader.js'
import { describeError, isNotFoundError } from './types/common.js'

export type SessionOptions = {
  client: CmsClient
  logger: Logger
  /** Where the mapping is saved and loaded. */
  mappingFile: string
  cache?: PostTypeCache
}

export type ConnectionReport = {
  ok: boolean
  /** Present when the identity lookup succeeded. */
  user?: CurrentUser
}

function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '')
}

/**
 * One operator session against one CMS. Every action runs to completion before
 * the next is accepted; nothing happens in the background.
 */
export class Session {
  private readonly client: CmsClient
  private readonly logger: Logger
  private readonly mappingFile: string
  private readonly cache: PostTypeCache
  private readonly datasets = new DatasetHolder()

  private postTypes: PostTypeMap = {}
  private selected: PostType | null = null
  private fieldList: string[] = []
  private mappingState: FieldMapping = {}
  private databaseFile: string | null = null

  constructor(options: SessionOptions) {
    this.client = options.client
    this.logger = options.logger
    this.mappingFile = options.mappingFile
    this.cache = options.cache ?? new PostTypeCache()
  }

  // -------------------------------------------------------------------------
  // Read-only views
  // -------------------------------------------------------------------------

  get postTypeKeys(): string[] {
    return Object.keys(this.postTypes)
  }

  get selectedPostType(): PostType | null {
    return this.selected
  }

  get fields(): string[] {
    return [...this.fieldList]
  }

  get mapping(): FieldMapping {
    return { ...this.mappingState }
  }

  get dataset(): Dataset | null {
    return this.datasets.current()
  }

  get columns(): string[] {
    return this.datasets.current()?.columns ?? []
  }

  get database(): string | null {
    return this.databaseFile
  }

  // -------------------------------------------------------------------------
  // Post types
  // -------------------------------------------------------------------------

  /**
   * Load the post type listing through the cache. A failure is logged and
   * leaves the session with no post types; it is not rethrown.
   */
  async loadPostTypes(): Promise<PostTypeMap> {
    try {
      this.postTypes = await this.cache.get(this.client.baseUrl, () => this.client.types.list())
      this.logger.debug('Post types loaded', { count: Object.keys(this.postTypes).length })
    } catch (err) {
      this.postTypes = {}
      this.logger.error(`Error fetching post types: ${describeError(err)}`)
    }
    return this.postTypes
  }

  /** Drop the cached listing and fetch it again. */
  async refreshPostTypes(): Promise<PostTypeMap> {
    this.cache.refresh(this.client.baseUrl)
    return this.loadPostTypes()
  }

  /**
   * Select a post type and rebuild the field list from its schema and a
   * sample of existing items. Sampling problems only produce a warning.
   *
   * @throws `Error` when `key` is not in the loaded listing.
   */
  async selectPostType(key: string): Promise<string[]> {
    if (!Object.hasOwn(this.postTypes, key)) {
      throw new Error(`Unknown post type: ${key}`)
    }
    const postType = this.postTypes[key]

    const { fields, warning } = await discoverFields(this.client, postType)
    if (warning !== undefined) this.logger.warn(warning)

    this.selected = postType
    this.fieldList = fields
    return this.fields
  }

  // -------------------------------------------------------------------------
  // Data sources
  // -------------------------------------------------------------------------

  /**
   * Load a CSV file as the active dataset. On failure no dataset is active.
   */
  async useCsv(path: string): Promise<Dataset> {
    this.databaseFile = null
    try {
      const dataset = this.datasets.replace(await loadCsvFile(path))
      this.logger.info(`Loaded ${dataset.rows.length} rows from ${describeSource(dataset.source)}`)
      return dataset
    } catch (err) {
      this.datasets.clear()
      throw err
    }
  }

  /** Open a database file and list its tables. The active dataset is kept until a table is chosen. */
  openDatabase(file: string): string[] {
    const tables = listTables(file)
    this.databaseFile = file
    return tables
  }

  /**
   * Load one table of the open database as the active dataset, replacing
   * whatever was active before.
   *
   * @throws `Error` when no database is open.
   */
  useTable(table: string): Dataset {
    if (this.databaseFile === null) {
      throw new Error('Open a database file first')
    }
    try {
      const dataset = this.datasets.replace(loadTable(this.databaseFile, table))
      this.logger.info(`Loaded ${dataset.rows.length} rows from ${describeSource(dataset.source)}`)
      return dataset
    } catch (err) {
      this.datasets.clear()
      throw err
    }
  }

  // -------------------------------------------------------------------------
  // Mapping
  // -------------------------------------------------------------------------

  /** Map `field` to `column`, or unmap it when `column` is `null`. */
  setMapping(field: string, column: string | null): void {
    this.mappingState = withMapping(this.mappingState, field, column)
  }

  clearMapping(): void {
    this.mappingState = {}
  }

  /**
   * Map every unmapped field to the column with the same name, ignoring case
   * and punctuation. Returns the entries added.
   */
  suggestMapping(): FieldMapping {
    const byName = new Map<string, string>()
    for (const column of this.columns) {
      const key = normalizeName(column)
      if (!byName.has(key)) byName.set(key, column)
    }

    const entries: [string, string][] = []
    for (const field of this.fieldList) {
      if (Object.hasOwn(this.mappingState, field)) continue
      const column = byName.get(normalizeName(field))
      if (column !== undefined) {
        this.mappingState = withMapping(this.mappingState, field, column)
        entries.push([field, column])
      }
    }
    return Object.fromEntries(entries)
  }

  /** Payloads the first `limit` rows would be uploaded as. */
  preview(limit = 5): JsonObject[] {
    return previewPayloads(this.requireDataset(), this.mappingState, limit)
  }

  async saveMapping(path: string = this.mappingFile): Promise<void> {
    await saveMapping(this.mappingState, path)
    this.logger.success(`Mapping saved to ${path}`)
  }

  /**
   * Replace the current mapping with the saved one. Returns `false` when there
   * is no saved mapping. Entries naming fields outside the current field list are kept.
   */
  async loadMapping(path: string = this.mappingFile): Promise<boolean> {
    try {
      this.mappingState = await loadMapping(path)
    } catch (err) {
      if (isNotFoundError(err)) {
        this.logger.warn(`No saved mapping at ${err.path}`)
        return false
      }
      throw err
    }

    const unknown = Object.keys(this.mappingState).filter((field) => !this.fieldList.includes(field))
    if (this.fieldList.length > 0 && unknown.length > 0) {
      this.logger.warn(`Loaded mapping names fields not offered by this post type: ${unknown.join(', ')}`)
    }
    return true
  }

  // -------------------------------------------------------------------------
  // Upload and diagnostics
  // -------------------------------------------------------------------------

  /**
   * Create one item per row of the active dataset in the selected post type.
   *
   * @throws `Error` when no post type is selected, no dataset is loaded, or the mapping is empty.
   */
  async upload(onProgress?: (fraction: number) => void): Promise<UploadResult> {
    const postType = this.selected
    if (postType === null) {
      throw new Error('Select a post type first')
    }
    const dataset = this.requireDataset()
    if (Object.keys(this.mappingState).length === 0) {
      throw new Error('Map at least one field before uploading')
    }

    const result = await runBatchUpload({
      dataset,
      mapping: this.mappingState,
      items: this.client.items(postType.rest_base),
      onProgress: (fraction) => onProgress?.(fraction),
      onRowError: (rowIndex, err) => {
        this.logger.error(`Row ${rowIndex + 1} failed: ${describeError(err)}`)
      },
    })

    this.logger.info(`Upload finished: ${result.succeeded} succeeded, ${result.failed} failed`)
    return result
  }

  /**
   * Probe the type listing and, when it answers, look up the authenticated
   * user with capabilities.
   */
  async testConnection(): Promise<ConnectionReport> {
    const ok = await this.client.types.validate()
    if (!ok) {
      this.logger.error(`Cannot reach ${this.client.baseUrl} with the configured credentials`)
      return { ok }
    }

    try {
      const user = await this.client.users.me('edit')
      this.logger.success(`Connected to ${this.client.baseUrl} as ${user.name}`, {
        roles: user.roles ?? [],
        canPublish: user.capabilities?.['publish_posts'] ?? false,
      })
      return { ok, user }
    } catch (err) {
      this.logger.warn(`Connected, but the current user lookup failed: ${describeError(err)}`)
      return { ok }
    }
  }

  private requireDataset(): Dataset {
    const dataset = this.datasets.current()
    if (dataset === null) {
      throw new Error('Load a CSV file or a database table first')
    }
    return dataset
  }
}
