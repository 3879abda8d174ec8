/**
 * wp-field-mapper entry point.
 *
 * Provides the {@link createCmsClient} factory, which returns a typed
 * {@link CmsClient} for the post type, content collection, and current-user
 * endpoints, plus the field extraction, data loading, mapping persistence, and
 * batch upload building blocks the interactive session is assembled from.
 *
 * @example
 * ```ts
 * import { createCmsClient, isRemoteError } from 'wp-field-mapper'
 *
 * const client = createCmsClient({
 *   baseUrl: 'cms.example.com',
 *   username: 'editor',
 *   applicationPassword: 'test-secret',
 * })
 *
 * try {
 *   const types = await client.types.list()
 * } catch (err) {
 *   if (isRemoteError(err)) {
 *     console.error(`HTTP ${err.status}: ${err.message}`)
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 * @module wp-field-mapper
 */

import { createHttpClient } from './http.js'
import { createResource } from './resource.js'
import { createPostTypesResource } from './resources/post-types.js'
import { createUsersResource } from './resources/users.js'
import { normalizeUrl } from './url.js'

import type { CollectionResource } from './resource.js'
import type { PostTypesResource } from './resources/post-types.js'
import type { UsersResource } from './resources/users.js'
import type { RestBase } from './types/common.js'

// Re-export the public surface
export type { CollectionResource } from './resource.js'
export type { PostTypesResource } from './resources/post-types.js'
export type { UsersResource } from './resources/users.js'
export {
  isRemoteError,
  isDecodeError,
  isParseError,
  isNotFoundError,
  isRestBase,
  isPostTypeKey,
  describeError,
} from './types/common.js'
export type {
  Brand,
  RestBase,
  PostTypeKey,
  RequestOptions,
  RemoteError,
  DecodeError,
  ParseError,
  NotFoundError,
  MapperError,
} from './types/common.js'
export type { JsonValue, JsonObject, JsonPrimitive } from './types/json.js'
export type { PostType, PostTypeMap, PostTypeSchema, SchemaProperty } from './types/post-types.js'
export type { CurrentUser, UserContext } from './types/users.js'
export { normalizeUrl } from './url.js'
export { BASE_FIELDS, extractFields, sampleItems, discoverFields } from './fields.js'
export type { FieldDiscovery, SampleResult } from './fields.js'
export { sanitizeSlug } from './slug.js'
export { parseCsv, loadCsvFile } from './data/csv.js'
export { listTables, loadTable } from './data/sqlite.js'
export { DatasetHolder } from './data/dataset.js'
export type { Dataset, DatasetSource, Row, Scalar } from './data/dataset.js'
export { saveMapping, loadMapping, withMapping, DEFAULT_MAPPING_FILE } from './mapping-store.js'
export type { FieldMapping } from './mapping-store.js'
export { runBatchUpload, buildPayload, previewPayloads } from './uploader.js'
export type { UploadResult, BatchUploadOptions } from './uploader.js'
export { PostTypeCache } from './cache.js'
export { Session } from './session.js'
export { loadConfig, ConfigError } from './config.js'
export type { AppConfig } from './config.js'
export { createLogger } from './logger.js'
export type { Logger, LogLevel } from './logger.js'

// ---------------------------------------------------------------------------
// Client config
// ---------------------------------------------------------------------------

/**
 * Configuration options for creating a {@link CmsClient}.
 *
 * @example
 * ```ts
 * const config: ClientConfig = {
 *   baseUrl: 'https://cms.example.com',
 *   username: 'editor',
 *   applicationPassword: 'test-secret',
 *   defaultTimeout: 15000,
 * }
 * ```
 */
export type ClientConfig = {
  /**
   * Site URL (e.g. `'https://cms.example.com'`). A bare host gets `https://`
   * prepended; trailing slashes are ignored.
   */
  baseUrl: string
  /** Account name used for HTTP Basic authentication. */
  username: string
  /** Application password generated for `username` in the CMS profile screen. */
  applicationPassword: string
  /**
   * Default request timeout in milliseconds.
   * @defaultValue 30000
   */
  defaultTimeout?: number
}

// ---------------------------------------------------------------------------
// CmsClient type
// ---------------------------------------------------------------------------

/**
 * Typed access to the REST endpoints the mapper consumes.
 *
 * Created via {@link createCmsClient}.
 *
 * @example
 * ```ts
 * const client = createCmsClient({ baseUrl: 'cms.example.com', username: 'editor', applicationPassword: 'test-secret' })
 *
 * const types = await client.types.list()
 * const books = client.items(types.book.rest_base)
 * await books.create({ title: 'Dune' })
 * const me = await client.users.me('edit')
 * ```
 */
export type CmsClient = {
  /** The normalised origin every request is sent to. */
  readonly baseUrl: string
  /** Post type listing and connection check. */
  types: PostTypesResource
  /** Content collection of one post type, addressed by its REST base. */
  items: (restBase: RestBase) => CollectionResource
  /** Current-user diagnostics. */
  users: UsersResource
}

// ---------------------------------------------------------------------------
// createCmsClient factory
// ---------------------------------------------------------------------------

/**
 * Create a configured CMS client instance.
 *
 * @param config - Client configuration (base URL, credentials, timeout).
 * @returns A configured {@link CmsClient}.
 * @throws `Error` if `baseUrl` is not a valid URL after normalisation.
 * @throws `Error` if `username` or `applicationPassword` is empty.
 */
export function createCmsClient(config: ClientConfig): CmsClient {
  const normalized = normalizeUrl(config.baseUrl).replace(/\/+$/, '')

  try {
    new globalThis.URL(normalized)
  } catch {
    throw new Error(`Invalid baseUrl: ${config.baseUrl}`)
  }

  if (config.username === '') {
    throw new Error('username must not be an empty string')
  }
  if (config.applicationPassword === '') {
    throw new Error('applicationPassword must not be an empty string')
  }

  const http = createHttpClient({
    baseUrl: normalized,
    username: config.username,
    applicationPassword: config.applicationPassword,
    defaultTimeout: config.defaultTimeout ?? 30000,
  })

  return {
    baseUrl: normalized,
    types: createPostTypesResource(http),
    items: (restBase: RestBase) => createResource(http, restBase),
    users: createUsersResource(http),
  }
}
