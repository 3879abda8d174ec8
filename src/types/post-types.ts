/**
 * Post type descriptors returned by `GET /wp/v2/types`, with the zod schemas
 * the listing is checked against before anything reads it.
 *
 * @module types/post-types
 */

import { z } from 'zod'
import { isPostTypeKey, isRestBase } from './common.js'

/**
 * Metadata for one schema property. Only its key is read; the descriptor may
 * carry any JSON-schema keyword.
 */
export const schemaPropertySchema = z.record(z.string(), z.unknown())

/** JSON-schema description of a post type's item shape. */
export const postTypeSchemaSchema = z
  .object({
    /** Property name → property metadata. Absent on types the user cannot edit. */
    properties: z.record(z.string(), schemaPropertySchema).optional(),
  })
  .passthrough()

/**
 * A registered post type.
 *
 * `schema` is only present when the listing was requested with enough
 * privileges or a schema-bearing context; callers must treat it as optional.
 */
export const postTypeSchema = z.object({
  /** Machine name (e.g. `'post'`). */
  slug: z.string().refine(isPostTypeKey, 'must not be empty'),
  /** Human-readable plural label. */
  name: z.string(),
  description: z.string().optional(),
  /** Collection path under `/wp/v2` (e.g. `'posts'`). */
  rest_base: z.string().refine(isRestBase, 'must not be empty'),
  /** Whether items can have parents. */
  hierarchical: z.boolean(),
  /** Whether items have a public front-end view. */
  viewable: z.boolean().optional(),
  /** Feature flags (`title`, `editor`, `thumbnail`, ...); values may be `true` or feature arguments. */
  supports: z.record(z.string(), z.unknown()).optional(),
  schema: postTypeSchemaSchema.optional(),
})

/** Response of the type listing: post type key → descriptor. */
export const postTypeMapSchema = z.record(z.string(), postTypeSchema)

export type SchemaProperty = z.infer<typeof schemaPropertySchema>
export type PostTypeSchema = z.infer<typeof postTypeSchemaSchema>
export type PostType = z.infer<typeof postTypeSchema>
export type PostTypeMap = z.infer<typeof postTypeMapSchema>
