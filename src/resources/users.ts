/**
 * Current-user resource, used for connection diagnostics.
 *
 * @module resources/users
 * @internal
 */

import type { HttpClient } from '../http.js'
import type { RequestOptions } from '../types/common.js'
import type { CurrentUser, UserContext } from '../types/users.js'

/**
 * User operations available on `client.users`.
 */
type UsersResource = {
  /**
   * Retrieve the user the credentials authenticate as.
   * @param context - `'edit'` adds roles and capabilities to the response.
   * @param opts - Optional request options.
   * @throws {@link import('../types/common.js').RemoteError} with status 401 when the credentials are rejected.
   */
  me: (context?: UserContext, opts?: RequestOptions) => Promise<CurrentUser>
}

/**
 * Create the users resource bound to the given HTTP client.
 * @param http - Configured HTTP client.
 * @internal
 */
function createUsersResource(http: HttpClient): UsersResource {
  return {
    me(context?: UserContext, opts?: RequestOptions): Promise<CurrentUser> {
      const params = context ? { context } : undefined
      return http.get<CurrentUser>('/users/me', params, opts)
    },
  }
}

export type { UsersResource }
export { createUsersResource }
