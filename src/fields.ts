/**
 * Destination field discovery: turns a post type's schema, plus a sample of
 * existing items, into the flat list of names a source column can be mapped to.
 *
 * @module fields
 */

import type { CmsClient } from './index.js'
import type { PostType } from './types/post-types.js'
import type { JsonValue } from './types/json.js'
import { getObject } from './types/json.js'
import { describeError, isRemoteError } from './types/common.js'

/** Core fields every content item accepts, whatever its schema advertises. */
export const BASE_FIELDS: readonly string[] = [
  'title',
  'content',
  'excerpt',
  'status',
  'author',
  'featured_media',
  'categories',
  'tags',
  'slug',
]

/** Key of the custom-field bucket on sampled items. */
const CUSTOM_FIELDS_KEY = 'acf'

/**
 * Build the sorted, deduplicated field list for a post type.
 *
 * Custom-field names are read from the first sampled item's `acf` object;
 * a missing sample or bucket contributes nothing.
 *
 * @param postType - The selected post type.
 * @param sample - Existing items of that type, possibly empty.
 */
export function extractFields(postType: PostType, sample: readonly JsonValue[] = []): string[] {
  const names = new Set<string>(BASE_FIELDS)

  const properties = postType.schema?.properties
  if (properties) {
    for (const key of Object.keys(properties)) names.add(key)
  }

  const customFields = sample.length > 0 ? getObject(sample[0], CUSTOM_FIELDS_KEY) : undefined
  if (customFields) {
    for (const key of Object.keys(customFields)) names.add(key)
  }

  return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
}

export type SampleResult = {
  items: JsonValue[]
  /** Set when sampling failed for a reason other than a missing collection. */
  warning?: string
}

/**
 * Fetch existing items of a post type for custom-field discovery.
 * A 404 means the collection has no items endpoint and yields no warning;
 * any other failure yields an empty sample and a warning.
 *
 * @param client - Configured CMS client.
 * @param postType - The post type to sample.
 */
export async function sampleItems(client: CmsClient, postType: PostType): Promise<SampleResult> {
  try {
    const items = await client.items(postType.rest_base).list()
    return { items }
  } catch (err) {
    if (isRemoteError(err) && err.status === 404) {
      return { items: [] }
    }
    return { items: [], warning: `Could not sample ${postType.rest_base} for custom fields: ${describeError(err)}` }
  }
}

export type FieldDiscovery = {
  fields: string[]
  warning?: string
}

/**
 * Sample a post type and extract its field list in one step.
 */
export async function discoverFields(client: CmsClient, postType: PostType): Promise<FieldDiscovery> {
  const { items, warning } = await sampleItems(client, postType)
  const fields = extractFields(postType, items)
  return warning === undefined ? { fields } : { fields, warning }
}
