/**
 * Host string normalisation.
 *
 * @module url
 */

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i

/**
 * Ensure a user-supplied host has an explicit scheme, defaulting to `https://`.
 * Input that already carries a scheme is returned unchanged.
 *
 * @example
 * ```ts
 * normalizeUrl('cms.example.com')       // => 'https://cms.example.com'
 * normalizeUrl('http://localhost:8080') // => 'http://localhost:8080'
 * ```
 */
export function normalizeUrl(host: string): string {
  if (SCHEME.test(host)) return host
  return 'https://' + host
}
