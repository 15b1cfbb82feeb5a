// ABOUTME: Spotify client-credentials token management with file persistence.
// ABOUTME: Restores the token from the last session and refreshes it once per expiry.

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { SPOTIFY_CONFIG } from '@tunescope/config';
import { isNotFoundError, writeFileAtomic } from '@tunescope/cache';
import {
  CredentialsMissingError,
  RequestDeduplicator,
  TokenAcquisitionError,
  describeError,
  fetchWithTimeout,
} from '@tunescope/shared';
import {
  ClientTokenResponseSchema,
  CredentialsSchema,
  type ClientTokenResponse,
  type Credentials,
} from './schemas';

export const SpotifyTokenSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  /** Epoch milliseconds */
  expires_at: z.number(),
  scope: z.string().optional(),
});

export type SpotifyToken = z.infer<typeof SpotifyTokenSchema>;

/**
 * - missing: no token file
 * - corrupt: file unreadable as a token
 * - invalid: well-formed but expired, or rejected by the API
 * - loaded: restored from the last session
 * - refreshed: newly acquired in this session
 */
export type TokenState = 'missing' | 'corrupt' | 'invalid' | 'loaded' | 'refreshed';

export interface TokenLoadResult {
  state: TokenState;
  token: SpotifyToken | null;
}

export type TokenRequester = (credentials: Credentials) => Promise<ClientTokenResponse>;

export interface SpotifyAuthConfig {
  tokenPath: string;
  credentialsPath: string;
  /** Token endpoint call; defaults to the Spotify accounts service */
  requestToken?: TokenRequester;
  now?: () => number;
}

/**
 * Request a client-credentials token from the Spotify accounts service.
 */
export async function requestClientToken(credentials: Credentials): Promise<ClientTokenResponse> {
  const basic = Buffer.from(`${credentials.client_id}:${credentials.client_secret}`).toString('base64');

  let response: Response;
  try {
    response = await fetchWithTimeout(SPOTIFY_CONFIG.tokenUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: `Basic ${basic}`,
      },
      body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
      timeout: 'slow',
    });
  } catch (error) {
    throw new TokenAcquisitionError(describeError(error));
  }

  if (!response.ok) {
    const body = await response.text();
    throw new TokenAcquisitionError(`${response.status} ${body}`, { status: response.status });
  }

  const parsed = ClientTokenResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new TokenAcquisitionError('unexpected response shape', {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

export class SpotifyAuth {
  private token: SpotifyToken | null = null;
  private tokenState: TokenState = 'missing';
  private readonly refreshes = new RequestDeduplicator<SpotifyToken>();
  private readonly requestToken: TokenRequester;
  private readonly now: () => number;

  constructor(private readonly config: SpotifyAuthConfig) {
    this.requestToken = config.requestToken ?? requestClientToken;
    this.now = config.now ?? Date.now;
  }

  get state(): TokenState {
    return this.tokenState;
  }

  /**
   * Restore the token persisted by a previous session. Never throws for a
   * missing or unreadable file; those only mean a new token is needed.
   */
  async load(): Promise<TokenLoadResult> {
    let text: string;
    try {
      text = await readFile(this.config.tokenPath, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        console.warn('[Spotify] No token file found, requesting new');
        return this.settle('missing', null);
      }
      console.error(`[Spotify] Token file unreadable (${describeError(error)}), requesting new`);
      return this.settle('corrupt', null);
    }

    let token: SpotifyToken;
    try {
      token = SpotifyTokenSchema.parse(JSON.parse(text));
    } catch (error) {
      console.error(`[Spotify] ${describeError(error)} reading token, requesting new`);
      return this.settle('corrupt', null);
    }

    if (this.isExpiring(token)) {
      console.warn(`[Spotify] Token ${token.access_token.substring(0, 8)}... has expired, requesting new`);
      return this.settle('invalid', null);
    }

    console.log(`[Spotify] Obtained token ${token.access_token.substring(0, 8)}... from file`);
    return this.settle('loaded', token);
  }

  /**
   * Acquire a new token with the operator's credentials. Concurrent callers
   * share one request. The token is persisted before it is returned.
   */
  refresh(): Promise<SpotifyToken> {
    return this.refreshes.run('client-token', () => this.acquire());
  }

  /**
   * Save the token for the next session. Failure only costs a refresh at the
   * next startup, so it is logged and not raised.
   */
  async persist(token: SpotifyToken): Promise<void> {
    try {
      await writeFileAtomic(this.config.tokenPath, JSON.stringify(token));
      console.log('[Spotify] Saved token to file');
    } catch (error) {
      console.warn(`[Spotify] Token not saved to ${this.config.tokenPath}: ${describeError(error)}`);
    }
  }

  /**
   * Load the last session's token or acquire a new one.
   */
  async initialize(): Promise<SpotifyToken> {
    const { state, token } = await this.load();
    if (state === 'loaded' && token) {
      await this.persist(token);
      return token;
    }
    return this.refresh();
  }

  async getAccessToken(): Promise<string> {
    if (this.token && !this.isExpiring(this.token)) {
      return this.token.access_token;
    }
    if (this.token) {
      this.tokenState = 'invalid';
    }
    const token = await this.refresh();
    return token.access_token;
  }

  /**
   * Drop the in-memory token after the API rejected it.
   */
  invalidate(): void {
    if (this.token) {
      console.warn(`[Spotify] Token ${this.token.access_token.substring(0, 8)}... rejected, will refresh`);
    }
    this.token = null;
    this.tokenState = 'invalid';
  }

  private async acquire(): Promise<SpotifyToken> {
    const credentials = await this.readCredentials();
    console.log(`[Spotify] Requesting token for app ${credentials.client_id.substring(0, 8)}...`);

    const response = await this.requestToken(credentials);
    const token: SpotifyToken = {
      access_token: response.access_token,
      token_type: response.token_type,
      expires_at: this.now() + response.expires_in * 1000,
      ...(response.scope !== undefined && { scope: response.scope }),
    };

    await this.persist(token);
    this.settle('refreshed', token);
    return token;
  }

  private async readCredentials(): Promise<Credentials> {
    const location = this.config.credentialsPath;

    let text: string;
    try {
      text = await readFile(location, 'utf8');
    } catch (error) {
      console.error(`[Spotify] Credentials not found at ${location}`);
      throw new CredentialsMissingError(location, isNotFoundError(error) ? undefined : describeError(error));
    }

    try {
      return CredentialsSchema.parse(JSON.parse(text));
    } catch (error) {
      console.error(`[Spotify] Credentials at ${location} are unusable`);
      throw new CredentialsMissingError(location, describeError(error));
    }
  }

  private isExpiring(token: SpotifyToken): boolean {
    return this.now() >= token.expires_at - SPOTIFY_CONFIG.tokenRefreshBufferMs;
  }

  private settle(state: TokenState, token: SpotifyToken | null): TokenLoadResult {
    this.tokenState = state;
    this.token = token;
    return { state, token };
  }
}
