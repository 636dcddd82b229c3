import { readAll, Stage } from '@pipeworks/pipeline'

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>

/**
 * A request whose response status is outside the 2xx range.
 */
export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly statusText: string) {
    super(`unexpected HTTP response status: ${status} ${statusText}`.trimEnd())
    this.name = 'HttpStatusError'
  }
}

/**
 * Sends an HTTP request and writes the response body. The input becomes the
 * request body, except for GET and HEAD requests which carry none and leave
 * the input unread.
 *
 * The body is copied whatever the status; a status outside 2xx then fails
 * the stage with an {@link HttpStatusError}.
 */
export function request(url: string, init: RequestInit = {}, fetchFn: FetchFunction = fetch): Stage {
  return async (stdin, stdout) => {
    const method = (init.method ?? 'GET').toUpperCase()
    const body = method === 'GET' || method === 'HEAD' ? undefined : await readAll(stdin)
    const response = await fetchFn(url, { ...init, method, body })

    if (response.body) {
      const reader = response.body.getReader()
      try {
        for (let result = await reader.read(); !result.done; result = await reader.read()) {
          await stdout.write(result.value)
        }
      } catch (error) {
        await reader.cancel()
        throw error
      }
    }

    if (!response.ok) {
      throw new HttpStatusError(response.status, response.statusText)
    }
  }
}

export function get(url: string, fetchFn?: FetchFunction): Stage {
  return request(url, { method: 'GET' }, fetchFn)
}

export function post(url: string, fetchFn?: FetchFunction): Stage {
  return request(url, { method: 'POST' }, fetchFn)
}
