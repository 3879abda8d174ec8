/**
 * Internal HTTP client layer built on the Fetch API.
 * Handles Basic authentication, REST prefixing, timeout merging,
 * JSON decoding, and structured error creation.
 *
 * @remarks This module is internal to the package and not part of the public API.
 *
 * @module http
 * @internal
 */

import { decodeError, remoteError } from './types/common.js'
import type { RequestOptions } from './types/common.js'

// ---------------------------------------------------------------------------
// Internal types (not exported in public API)
// ---------------------------------------------------------------------------

/** Path prefix of the core content endpoints. */
const REST_PREFIX = '/wp-json/wp/v2'

/**
 * Configuration required to create an {@link HttpClient}.
 * @internal
 */
type HttpClientConfig = {
  /** Fully qualified origin (e.g. `https://cms.example.com`). No trailing slash. */
  baseUrl: string
  /** Account used for HTTP Basic authentication. */
  username: string
  /** Application password issued for `username`. */
  applicationPassword: string
  /** Default request timeout in milliseconds. Applied via `AbortSignal.timeout()`. */
  defaultTimeout: number
}

/**
 * Low-level HTTP methods used internally by resource factories.
 * All paths are automatically prefixed with `/wp-json/wp/v2`.
 * @internal
 */
type HttpClient = {
  /**
   * Perform a GET request and decode the JSON response.
   * @typeParam T - Expected response body type.
   * @param path - API path (e.g. `'/types'`).
   * @param params - Optional query parameters appended as `?key=value`.
   * @param opts - Per-request options (abort signal).
   * @throws {@link RemoteError} on network failure or non-2xx status.
   * @throws {@link DecodeError} when a 2xx body is not valid JSON.
   */
  get: <T>(path: string, params?: Record<string, string>, opts?: RequestOptions) => Promise<T>

  /**
   * Perform a POST request with a JSON body and decode the response.
   * @typeParam T - Expected response body type.
   * @param path - API path.
   * @param body - JSON-serializable request body.
   * @param opts - Per-request options.
   * @throws {@link RemoteError} on network failure or non-2xx status.
   * @throws {@link DecodeError} when a 2xx body is not valid JSON.
   */
  post: <T>(path: string, body?: Record<string, unknown>, opts?: RequestOptions) => Promise<T>
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Build a full URL by joining the base URL, REST prefix, path, and optional query params.
 * @internal
 */
function buildUrl(baseUrl: string, path: string, params?: Record<string, string>): string {
  const url = baseUrl + REST_PREFIX + path
  if (!params || Object.keys(params).length === 0) return url
  const search = new URLSearchParams(params)
  const separator = url.includes('?') ? '&' : '?'
  return url + separator + search.toString()
}

/**
 * Merge the default timeout signal with an optional caller-provided abort signal.
 * Either signal aborting will cancel the request.
 * @internal
 */
function mergeSignals(defaultTimeout: number, opts?: RequestOptions): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(defaultTimeout)
  if (!opts?.signal) return timeoutSignal

  const controller = new AbortController()

  const onAbort = (source: AbortSignal) => () => {
    if (!controller.signal.aborted) controller.abort(source.reason)
  }

  timeoutSignal.addEventListener('abort', onAbort(timeoutSignal), { once: true })
  opts.signal.addEventListener('abort', onAbort(opts.signal), { once: true })

  // If the caller's signal is already aborted, propagate immediately
  if (opts.signal.aborted) controller.abort(opts.signal.reason)

  return controller.signal
}

/**
 * Encode `username:password` for the `Authorization: Basic` header.
 * @internal
 */
function basicAuth(username: string, password: string): string {
  return 'Basic ' + Buffer.from(`${username}:${password}`, 'utf8').toString('base64')
}

/**
 * Parse an error body as JSON when possible, falling back to the raw text.
 * @internal
 */
function parseErrorBody(text: string): unknown {
  if (text === '') return undefined
  try {
    return JSON.parse(text) as unknown
  } catch {
    return text
  }
}

/**
 * Run `fetch`, converting a rejected promise (DNS, refused connection, abort)
 * into a {@link RemoteError} with status `0`.
 * @internal
 */
async function send(url: string, init: RequestInit): Promise<Response> {
  try {
    return await fetch(url, init)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw remoteError(0, message)
  }
}

/**
 * Validate status and decode the JSON body.
 * @typeParam T - Expected parsed response type.
 * @throws {@link RemoteError} on non-2xx status.
 * @throws {@link DecodeError} when the body is not valid JSON.
 * @internal
 */
async function handleResponse<T>(response: Response): Promise<T> {
  const text = await response.text()

  if (!response.ok) {
    throw remoteError(response.status, response.statusText, parseErrorBody(text))
  }

  try {
    return JSON.parse(text) as T
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw decodeError(message, text.slice(0, 200))
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create an {@link HttpClient} configured with Basic authentication,
 * base URL, and timeout.
 *
 * @param config - HTTP client configuration.
 * @returns A configured `HttpClient` with `get` and `post` methods.
 * @internal
 */
function createHttpClient(config: HttpClientConfig): HttpClient {
  const { baseUrl, username, applicationPassword, defaultTimeout } = config
  const authorization = basicAuth(username, applicationPassword)

  function headers(): Record<string, string> {
    return {
      'Accept': 'application/json',
      'Content-Type': 'application/json',
      'Authorization': authorization,
    }
  }

  return {
    async get<T>(path: string, params?: Record<string, string>, opts?: RequestOptions): Promise<T> {
      const url = buildUrl(baseUrl, path, params)
      const response = await send(url, {
        method: 'GET',
        headers: headers(),
        signal: mergeSignals(defaultTimeout, opts),
      })
      return handleResponse<T>(response)
    },

    async post<T>(path: string, body?: Record<string, unknown>, opts?: RequestOptions): Promise<T> {
      const url = buildUrl(baseUrl, path)
      const response = await send(url, {
        method: 'POST',
        headers: headers(),
        signal: mergeSignals(defaultTimeout, opts),
        body: body !== undefined ? JSON.stringify(body) : undefined,
      })
      return handleResponse<T>(response)
    },
  }
}

export type { HttpClient, HttpClientConfig }
export { createHttpClient, REST_PREFIX }
