/**
 * Identity types returned by `GET /wp/v2/users/me`.
 *
 * @module types/users
 */

/**
 * `context` parameter for the current-user endpoint.
 *
 * - `'view'` - Public profile fields only.
 * - `'edit'` - Adds email, roles, and capabilities (requires an authenticated editor).
 */
export type UserContext = 'view' | 'edit'

/**
 * The authenticated user. Fields beyond `id` and `name` are only present
 * in the `edit` context.
 */
export type CurrentUser = {
  /** Numeric user ID. */
  id: number
  /** Display name. */
  name: string
  /** Login name (edit context). */
  username?: string
  /** Email address (edit context). */
  email?: string
  /** URL-safe author slug. */
  slug?: string
  /** Role names (edit context). */
  roles?: string[]
  /** Capability name → granted (edit context). */
  capabilities?: Record<string, boolean>
}
