import fetch from 'node-fetch'
import type { RequestInit, Response } from 'node-fetch'
import type { Readable } from 'stream'
import type { z } from 'zod'
import { HTTPError, ResponseFormatError } from './errors'
import type { UrlScoped } from './handle'
import { logDebug } from './logger'
import type { JsonValue, QueryParams } from './types'

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export type Transport = {
  fetch: FetchFn
  // Milliseconds for JSON calls, 0 disables. Raw content transfers pass
  // their own timeout.
  timeout: number
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export type ApiRequest = {
  method: HttpMethod
  url: string
  params?: QueryParams
  json?: unknown
  body?: Readable
  contentLength?: number
  headers?: Record<string, string>
  authenticate?: boolean
  timeout?: number
}

export const defaultFetch: FetchFn = (url, init) => fetch(url, init)

export function withQuery(url: string, params: QueryParams): string {
  const search = new URLSearchParams(
    Object.entries(params).map(([key, value]): [string, string] => [key, String(value)]),
  ).toString()
  if (!search) return url
  return `${url}${url.includes('?') ? '&' : '?'}${search}`
}

async function serverMessage(response: Response): Promise<string> {
  const text = await response.text()
  let body: unknown
  try {
    body = JSON.parse(text)
  } catch {
    // Proxies and some error pages answer with HTML or plain text
    return ''
  }
  if (
    typeof body === 'object' &&
    body !== null &&
    'message' in body &&
    typeof body.message === 'string'
  ) {
    return body.message
  }
  return ''
}

// Fails with HTTPError unless the status is 2xx; the body is left unread.
export async function ensureOk(
  response: Response,
  operation: string,
): Promise<Response> {
  if (!response.ok) {
    throw new HTTPError(
      operation,
      response.status,
      response.url,
      await serverMessage(response),
    )
  }
  return response
}

// The single gate every JSON call goes through. An empty 2xx body
// (204 No Content on deletes) gives null.
export async function checkResponse(
  response: Response,
  operation: string,
): Promise<JsonValue> {
  await ensureOk(response, operation)
  const text = await response.text()
  if (text.trim() === '') return null
  try {
    const body: JsonValue = JSON.parse(text)
    return body
  } catch (error) {
    throw new ResponseFormatError(
      operation,
      `body is not JSON (${error instanceof Error ? error.message : String(error)})`,
    )
  }
}

export async function send(
  scope: UrlScoped,
  request: ApiRequest,
): Promise<Response> {
  const params =
    request.authenticate === false
      ? { ...request.params }
      : { ...request.params, access_token: scope.credential }
  const headers: Record<string, string> = { ...request.headers }
  let body: string | Readable | undefined

  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/octet-stream'
    if (request.contentLength !== undefined) {
      headers['Content-Length'] = request.contentLength.toString()
    }
    body = request.body
  } else if (request.json !== undefined) {
    headers['Content-Type'] = 'application/json'
    body = JSON.stringify(request.json)
  }

  logDebug(`${request.method} ${request.url}`)
  return scope.transport.fetch(withQuery(request.url, params), {
    method: request.method,
    headers,
    body,
    timeout: request.timeout ?? scope.transport.timeout,
  })
}

export async function call(
  scope: UrlScoped,
  request: ApiRequest,
  operation: string,
): Promise<JsonValue> {
  return checkResponse(await send(scope, request), operation)
}

export function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  body: JsonValue,
  operation: string,
): z.output<S> {
  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    throw new ResponseFormatError(
      operation,
      parsed.error.errors
        .map((issue) => `${issue.path.join('.') || '(body)'} ${issue.message}`)
        .join('; '),
    )
  }
  return parsed.data
}
