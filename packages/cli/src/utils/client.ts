import type { z } from 'zod';
import { ApiRequestError, DEFAULT_API_URL, apiErrorSchema } from '@diskwatch/shared';

export interface ApiRequestOptions {
  method?: 'GET' | 'POST';
}

/**
 * Base URL of the diskwatch API: the `--url` flag, then `DISKWATCH_API_URL`,
 * then the local default.
 */
export function resolveApiUrl(url?: string): string {
  return url || process.env.DISKWATCH_API_URL || DEFAULT_API_URL;
}

/** URL path for a mountpoint's history; each path segment is escaped. */
export function historyPath(mountpoint: string, hours: number | string): string {
  const normalized = mountpoint.startsWith('/') ? mountpoint : `/${mountpoint}`;
  const encoded = normalized.split('/').map(encodeURIComponent).join('/');
  return `/api/history${encoded}?hours=${encodeURIComponent(String(hours))}`;
}

/**
 * Send a request to the API and validate the JSON body against `schema`.
 * Any failure surfaces as an ApiRequestError; status 0 means the server
 * could not be reached.
 */
export async function apiRequest<T extends z.ZodTypeAny>(
  baseUrl: string,
  path: string,
  schema: T,
  options: ApiRequestOptions = {},
): Promise<z.output<T>> {
  const url = new URL(path, baseUrl);

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: { accept: 'application/json' },
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ApiRequestError(0, `Cannot reach diskwatch at ${baseUrl}: ${reason}`);
  }

  const text = await response.text();
  let body: unknown = null;
  if (text) {
    try {
      body = JSON.parse(text);
    } catch {
      throw new ApiRequestError(response.status, `Invalid JSON in response to ${url.pathname}`);
    }
  }

  if (!response.ok) {
    const error = apiErrorSchema.safeParse(body);
    throw new ApiRequestError(
      response.status,
      error.success ? error.data.error : `Request failed with status ${response.status}`,
    );
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiRequestError(response.status, `Unexpected response from ${url.pathname}`);
  }
  return result.data;
}
