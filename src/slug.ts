/**
 * Slug sanitising applied to mapped `slug` values before upload.
 *
 * @module slug
 */

/**
 * Strip everything but word characters (letters and digits of any script,
 * underscore) and hyphens, lowercase, then turn spaces into hyphens.
 *
 * Spaces are removed by the first step, so the last one only ever sees
 * strings without spaces: `sanitizeSlug('My Slug!!')` is `'myslug'`.
 */
export function sanitizeSlug(value: string): string {
  return value
    .replace(/[^\p{L}\p{N}_-]/gu, '')
    .toLowerCase()
    .replace(/ /g, '-')
}
