/**
 * Core type utilities, branded identifiers, request options, and tagged error shapes
 * shared by the CMS client, the data loaders, and the mapping store.
 *
 * @module types/common
 */

// ---------------------------------------------------------------------------
// Brand utility
// ---------------------------------------------------------------------------

/**
 * Nominal (branded) type utility that adds a compile-time tag to a base type.
 * Prevents accidental assignment between structurally identical but semantically
 * different strings (e.g. a post type's key vs. its REST base).
 *
 * @typeParam T - The underlying primitive type.
 * @typeParam B - A unique string literal that distinguishes this brand.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B }

/** Collection path segment of a post type (e.g. `'posts'`, `'pages'`, `'books'`). */
export type RestBase = Brand<string, 'RestBase'>

/** Key of a post type in the `/types` listing (e.g. `'post'`, `'page'`). */
export type PostTypeKey = Brand<string, 'PostTypeKey'>

/** Narrow a non-empty string to {@link RestBase}. */
export function isRestBase(value: string): value is RestBase {
  return value.length > 0
}

/** Narrow a non-empty string to {@link PostTypeKey}. */
export function isPostTypeKey(value: string): value is PostTypeKey {
  return value.length > 0
}

// ---------------------------------------------------------------------------
// Request options
// ---------------------------------------------------------------------------

/**
 * Optional per-request configuration passed to every client method.
 *
 * @example
 * ```ts
 * const controller = new AbortController()
 * const types = await client.types.list({ signal: controller.signal })
 * ```
 */
export type RequestOptions = {
  /** An {@link AbortSignal} to cancel the request. Merged with the default timeout signal. */
  signal?: AbortSignal
}

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

/**
 * Failure contacting the CMS: a non-2xx response, or a network-level failure
 * (DNS, connection refused, timeout) reported with `status: 0`.
 *
 * @example
 * ```ts
 * try {
 *   await client.items(restBase).create(payload)
 * } catch (err) {
 *   if (isRemoteError(err)) {
 *     console.error(`HTTP ${err.status}: ${err.message}`, err.body)
 *   }
 * }
 * ```
 */
export type RemoteError = {
  /** Discriminant tag. Always `'RemoteError'`. */
  readonly _tag: 'RemoteError'
  /** HTTP status code, or `0` when no response was received. */
  status: number
  /** HTTP status text, or the underlying network error message. */
  message: string
  /** Response body (parsed JSON when possible, raw text otherwise). */
  body?: unknown
}

/** A 2xx response whose body is not valid JSON. */
export type DecodeError = {
  readonly _tag: 'DecodeError'
  message: string
  /** The undecodable text, truncated. */
  raw?: string
}

/** An uploaded CSV or database table that could not be read into a dataset. */
export type ParseError = {
  readonly _tag: 'ParseError'
  message: string
  /** Zero-based data row the parser stopped at, when known. */
  row?: number
}

/** A mapping or CSV file does not exist. */
export type NotFoundError = {
  readonly _tag: 'NotFoundError'
  path: string
}

/** Every tagged error raised by this package. */
export type MapperError = RemoteError | DecodeError | ParseError | NotFoundError

function hasTag(err: unknown, tag: MapperError['_tag']): boolean {
  return typeof err === 'object' && err !== null && '_tag' in err && err._tag === tag
}

/**
 * Type guard that narrows an unknown caught value to {@link RemoteError}.
 *
 * @param err - The caught error value to check.
 */
export function isRemoteError(err: unknown): err is RemoteError {
  return hasTag(err, 'RemoteError')
}

/** Type guard for {@link DecodeError}. */
export function isDecodeError(err: unknown): err is DecodeError {
  return hasTag(err, 'DecodeError')
}

/** Type guard for {@link ParseError}. */
export function isParseError(err: unknown): err is ParseError {
  return hasTag(err, 'ParseError')
}

/** Type guard for {@link NotFoundError}. */
export function isNotFoundError(err: unknown): err is NotFoundError {
  return hasTag(err, 'NotFoundError')
}

/** Whether a filesystem call failed because the path does not exist. */
export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export function remoteError(status: number, message: string, body?: unknown): RemoteError {
  return { _tag: 'RemoteError' as const, status, message, body }
}

export function decodeError(message: string, raw?: string): DecodeError {
  return { _tag: 'DecodeError' as const, message, raw }
}

export function parseError(message: string, row?: number): ParseError {
  return { _tag: 'ParseError' as const, message, row }
}

export function notFoundError(path: string): NotFoundError {
  return { _tag: 'NotFoundError' as const, path }
}

/**
 * Render any caught value as a single human-readable line for display.
 *
 * @example
 * ```ts
 * describeError(remoteError(400, 'Bad Request', { code: 'rest_invalid_param' }))
 * // => 'HTTP 400 Bad Request: {"code":"rest_invalid_param"}'
 * ```
 */
export function describeError(err: unknown): string {
  if (isRemoteError(err)) {
    const head = err.status === 0 ? `Network error: ${err.message}` : `HTTP ${err.status} ${err.message}`
    if (err.body === undefined || err.body === '') return head
    const body = typeof err.body === 'string' ? err.body : JSON.stringify(err.body)
    return `${head}: ${body}`
  }
  if (isDecodeError(err)) return `Invalid JSON response: ${err.message}`
  if (isParseError(err)) {
    return err.row === undefined ? `Parse error: ${err.message}` : `Parse error at row ${err.row}: ${err.message}`
  }
  if (isNotFoundError(err)) return `File not found: ${err.path}`
  if (err instanceof Error) return err.message
  return String(err)
}
