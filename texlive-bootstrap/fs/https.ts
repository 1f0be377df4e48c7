// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { default as got, HTTPError, RequestError } from 'got';

/** HTTP(S) GET request, returns a stream. Retrying is left to the caller. */
export function getStream(location: string, options: { timeout: number }) {
  return got.stream(location, {
    timeout: { request: options.timeout },
    retry: { limit: 0 },
    headers: { 'accept-encoding': 'identity' },
  });
}

/** status codes worth another attempt */
const transientStatus = new Set([408, 425, 429, 500, 502, 503, 504]);

/**
 * Decides whether a failed request may succeed if repeated.
 *
 * Connection level failures and timeouts are transient; so are the status
 * codes above. Any other HTTP status (e.g. 404) is permanent.
 */
export function isTransient(err: unknown): boolean {
  if (err instanceof HTTPError) {
    return transientStatus.has(err.response.statusCode);
  }
  return err instanceof RequestError;
}

export function describeFailure(err: unknown): string {
  if (err instanceof HTTPError) {
    return `HTTP ${err.response.statusCode} ${err.response.statusMessage ?? ''}`.trim();
  }
  return err instanceof Error ? err.message : String(err);
}
