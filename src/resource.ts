/**
 * Generic content-collection resource factory that generates list/get/create
 * methods for any post type's REST base using a shared {@link HttpClient}.
 *
 * @module resource
 * @internal
 */

import type { HttpClient } from './http.js'
import type { RequestOptions, RestBase } from './types/common.js'
import type { JsonObject, JsonValue } from './types/json.js'

// ---------------------------------------------------------------------------
// Collection resource type
// ---------------------------------------------------------------------------

/**
 * Read and create operations on one content collection (`/wp/v2/{rest_base}`).
 * Items are returned as untyped {@link JsonValue}s because their shape depends
 * on the post type and on installed plugins.
 *
 * @example
 * ```ts
 * const books = client.items('books' as RestBase)
 * const sample = await books.list()
 * await books.create({ title: 'Dune', status: 'draft' })
 * ```
 */
type CollectionResource = {
  /** The collection path this resource is bound to. */
  readonly restBase: RestBase

  /**
   * List items of this collection. Without `params` the server's default
   * page size applies.
   * @param params - Optional query parameters (e.g. `{ per_page: '5' }`).
   * @param opts - Optional request options.
   */
  list: (params?: Record<string, string>, opts?: RequestOptions) => Promise<JsonValue[]>

  /**
   * Get a single item by its numeric ID.
   * @param id - The item ID.
   * @param opts - Optional request options.
   */
  get: (id: number, opts?: RequestOptions) => Promise<JsonValue>

  /**
   * Create one item from a mapped payload.
   * @param payload - Field name → value.
   * @param opts - Optional request options.
   * @returns The created item as echoed by the server.
   */
  create: (payload: JsonObject, opts?: RequestOptions) => Promise<JsonValue>
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a collection resource bound to a specific REST base.
 *
 * URL patterns:
 * - `list`  : `GET /wp-json/wp/v2/{restBase}`
 * - `get`   : `GET /wp-json/wp/v2/{restBase}/{id}`
 * - `create`: `POST /wp-json/wp/v2/{restBase}`
 *
 * @param http - The configured HTTP client.
 * @param restBase - The post type's collection path (e.g. `'posts'`).
 * @internal
 */
function createResource(http: HttpClient, restBase: RestBase): CollectionResource {
  const path = `/${encodeURIComponent(restBase)}`

  return {
    restBase,

    async list(params?: Record<string, string>, opts?: RequestOptions): Promise<JsonValue[]> {
      const body = await http.get<JsonValue>(path, params, opts)
      return Array.isArray(body) ? body : []
    },

    get(id: number, opts?: RequestOptions): Promise<JsonValue> {
      return http.get<JsonValue>(`${path}/${id}`, undefined, opts)
    },

    create(payload: JsonObject, opts?: RequestOptions): Promise<JsonValue> {
      return http.post<JsonValue>(path, payload, opts)
    },
  }
}

export type { CollectionResource }
export { createResource }
