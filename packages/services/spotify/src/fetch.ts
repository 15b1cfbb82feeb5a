// ABOUTME: Spotify-specific fetch that maps transport and status failures to typed errors.
// ABOUTME: Nothing is retried here; callers decide their own retry policy.

import {
  NotFoundError,
  RateLimitError,
  RemoteCallError,
  describeError,
  fetchWithTimeout,
  type FetchWithTimeoutOptions,
} from '@tunescope/shared';

export interface SpotifyRequest {
  /** Remote operation name, used in errors and logs */
  operation: string;
  /** Resource label and id for 404s, e.g. `['Artist', id]` */
  resource?: [string, string];
  /** Called when the API rejects the bearer token */
  onUnauthorized?: () => void;
}

/**
 * Make a request to the Spotify API and return the parsed JSON body.
 *
 * @param url - The Spotify API URL to fetch
 * @param options - Fetch options including timeout
 * @param request - Operation context for error reporting
 */
export async function spotifyFetch(
  url: string,
  options: FetchWithTimeoutOptions,
  request: SpotifyRequest
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchWithTimeout(url, options);
  } catch (error) {
    console.error(`[Spotify] ${request.operation} request failed: ${describeError(error)}`);
    throw new RemoteCallError('Spotify', request.operation, describeError(error));
  }

  if (!response.ok) {
    if (response.status === 404 && request.resource) {
      const [resource, id] = request.resource;
      throw new NotFoundError(resource, id);
    }
    if (response.status === 401) {
      request.onUnauthorized?.();
    }
    if (response.status === 429) {
      const retryAfter = parseInt(response.headers.get('Retry-After') || '', 10);
      console.error(`[Spotify] 429 Rate Limited for ${request.operation}, Retry-After: ${retryAfter || 'unknown'}s`);
      throw new RateLimitError('Spotify', Number.isNaN(retryAfter) ? undefined : retryAfter);
    }
    throw new RemoteCallError(
      'Spotify',
      request.operation,
      `${response.status} ${response.statusText}`,
      response.status >= 500 ? 502 : response.status
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new RemoteCallError('Spotify', request.operation, `invalid JSON body: ${describeError(error)}`);
  }
}
