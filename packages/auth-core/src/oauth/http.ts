import type { z } from 'zod';
import { OAuthFailedError } from '../errors.js';

export type FetchFn = typeof fetch;

export type ProviderRequestOptions = {
  fetchImpl?: FetchFn | undefined;
  timeoutMs: number;
};

/**
 * Performs one provider call and validates the JSON body. Transport errors,
 * timeouts, non-2xx responses and unexpected payloads all become OAuthFailedError.
 */
export async function requestProviderJson<Schema extends z.ZodTypeAny>(
  url: string,
  init: RequestInit,
  schema: Schema,
  options: ProviderRequestOptions
): Promise<z.infer<Schema>> {
  const fetchFn = options.fetchImpl ?? fetch;
  const headers = new Headers(init.headers);
  headers.set('Accept', 'application/json');

  let response: Response;
  try {
    response = await fetchFn(url, {
      ...init,
      headers,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new OAuthFailedError({ cause: error });
  }

  if (!response.ok) {
    throw new OAuthFailedError({
      cause: new Error(`Provider responded with ${response.status} for ${new URL(url).host}`),
    });
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new OAuthFailedError({ cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new OAuthFailedError({ cause: parsed.error });
  }
  return parsed.data;
}

export function redirectUriFor(baseUrl: string, provider: string): string {
  return `${baseUrl}/api/auth/${provider}/callback`;
}
