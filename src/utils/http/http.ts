/**
 * HTTP helpers shared by the SD-WAN and UPS clients
 */

import type { FetchFn } from '$types/common';
import { HttpError, RequestTimeoutError } from '$types/errors';

/**
 * Perform a request and read its response, all within `timeoutMs`
 *
 * The deadline covers the body as well as the headers: a server that sends
 * its status line and then stalls still fails with RequestTimeoutError.
 * Non-2xx responses are turned into HttpError before `read` runs.
 *
 * @param fetchImpl - Fetch implementation (global fetch in production)
 * @param url - Absolute URL
 * @param init - Request options
 * @param timeoutMs - Per-call timeout
 * @param read - Consumes the successful response
 * @returns Whatever `read` produced
 */
export async function requestWithTimeout<T>(
  fetchImpl: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new RequestTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  async function exchange(): Promise<T> {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });

    if (!response.ok) {
      throw new HttpError(response.status, response.statusText);
    }

    return read(response);
  }

  try {
    return await Promise.race([exchange(), deadline]);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new RequestTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * GET/POST returning a JSON object body, under one deadline
 * @returns Parsed object
 */
export function requestJson(
  fetchImpl: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Record<string, unknown>> {
  return requestWithTimeout(fetchImpl, url, init, timeoutMs, readJsonObject);
}

/**
 * Request whose body is read as text, under one deadline
 * @returns Body text
 */
export function requestText(
  fetchImpl: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<string> {
  return requestWithTimeout(fetchImpl, url, init, timeoutMs, (response) => response.text());
}

/**
 * Read a JSON body as an object, rejecting arrays and primitives
 * @param response - Successful response
 * @returns Parsed object
 */
export async function readJsonObject(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  if (!isRecord(body)) {
    throw new Error('Expected a JSON object in response body');
  }
  return body;
}

/**
 * Narrow an unknown value to a plain object
 * @param value - Value to check
 * @returns true if value is a non-null, non-array object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract a cookie value from a response's Set-Cookie headers
 * @param response - Response to inspect
 * @param name - Cookie name
 * @returns Cookie value, or null if the cookie was not set
 */
export function findCookie(response: Response, name: string): string | null {
  for (const header of response.headers.getSetCookie()) {
    const pair = header.split(';', 1)[0];
    const eq = pair.indexOf('=');
    if (eq > 0 && pair.slice(0, eq).trim() === name) {
      return pair.slice(eq + 1).trim();
    }
  }
  return null;
}
