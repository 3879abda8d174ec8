/**
 * Time-bounded memo of the post type listing, keyed by site URL.
 *
 * @module cache
 */

import type { PostTypeMap } from './types/post-types.js'

type Entry = {
  postTypes: PostTypeMap
  fetchedAt: number
}

export type PostTypeCacheOptions = {
  /** How long a listing stays fresh, in milliseconds. */
  ttlMs?: number
  /** Clock used for freshness checks. */
  now?: () => number
}

/**
 * Caches `GET /types` results per base URL. A stale or missing entry is
 * refetched on the next {@link PostTypeCache.get}; {@link PostTypeCache.refresh}
 * drops entries explicitly. Failed fetches are not cached.
 */
export class PostTypeCache {
  private readonly entries = new Map<string, Entry>()
  private readonly ttlMs: number
  private readonly now: () => number

  constructor(options: PostTypeCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 5 * 60 * 1000
    this.now = options.now ?? Date.now
  }

  /**
   * Return the fresh listing for `baseUrl`, calling `fetcher` when there is none.
   */
  async get(baseUrl: string, fetcher: () => Promise<PostTypeMap>): Promise<PostTypeMap> {
    const entry = this.entries.get(baseUrl)
    if (entry && this.now() - entry.fetchedAt < this.ttlMs) {
      return entry.postTypes
    }

    const postTypes = await fetcher()
    this.entries.set(baseUrl, { postTypes, fetchedAt: this.now() })
    return postTypes
  }

  /** Invalidate one site's listing, or every listing when `baseUrl` is omitted. */
  refresh(baseUrl?: string): void {
    if (baseUrl === undefined) {
      this.entries.clear()
    } else {
      this.entries.delete(baseUrl)
    }
  }
}
