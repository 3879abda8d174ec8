/**
 * Post type listing resource (`GET /wp/v2/types`) plus a connection check
 * built on the same endpoint.
 *
 * @module resources/post-types
 * @internal
 */

import type { ZodIssue } from 'zod'
import type { HttpClient } from '../http.js'
import type { RequestOptions } from '../types/common.js'
import type { PostTypeMap } from '../types/post-types.js'
import type { JsonValue } from '../types/json.js'
import { postTypeMapSchema } from '../types/post-types.js'
import { decodeError } from '../types/common.js'

/**
 * Post type operations available on `client.types`.
 */
type PostTypesResource = {
  /**
   * List every registered post type, keyed by name.
   * @param opts - Optional request options.
   * @throws {@link import('../types/common.js').RemoteError} on network failure or non-2xx status.
   * @throws {@link import('../types/common.js').DecodeError} when the body is not an object of
   * well-formed post types; the message names the first offending entry.
   */
  list: (opts?: RequestOptions) => Promise<PostTypeMap>

  /**
   * Check that the CMS is reachable and accepts the credentials.
   * Collapses every failure to `false`; never throws.
   * @param opts - Optional request options.
   */
  validate: (opts?: RequestOptions) => Promise<boolean>
}

/**
 * Name the listing entry an issue belongs to, e.g.
 * `post type "book" field rest_base: Required`.
 */
function describeIssue(issue: ZodIssue): string {
  const [key, ...rest] = issue.path
  if (key === undefined) {
    return `expected an object of post types: ${issue.message}`
  }
  const field = rest.length > 0 ? ` field ${rest.join('.')}` : ''
  return `post type "${String(key)}"${field}: ${issue.message}`
}

/**
 * Create the post types resource bound to the given HTTP client.
 * @param http - Configured HTTP client.
 * @internal
 */
function createPostTypesResource(http: HttpClient): PostTypesResource {
  async function list(opts?: RequestOptions): Promise<PostTypeMap> {
    const body = await http.get<JsonValue>('/types', undefined, opts)
    const parsed = postTypeMapSchema.safeParse(body)
    if (!parsed.success) {
      throw decodeError(describeIssue(parsed.error.issues[0]))
    }
    return parsed.data
  }

  return {
    list,

    async validate(opts?: RequestOptions): Promise<boolean> {
      try {
        await list(opts)
        return true
      } catch {
        return false
      }
    },
  }
}

export type { PostTypesResource }
export { createPostTypesResource }
