import { tokenResponseSchema } from '../models/telemetry';
import { AuthError } from '../utils/errors';
import {
  fetchText,
  parseJson,
  RequestFailure,
  type FetchLike,
  type TextResponse,
} from '../utils/http';
import { logger } from '../utils/logger';

const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;
const SCOPE = 'offline_access openid profile email';

export type AccessToken = {
  readonly value: string;
  /** Epoch milliseconds. */
  readonly expiresAt: number;
};

export type AuthSessionOptions = {
  domain: string;
  clientId: string;
  audience: string;
  credentials: { email: string; password: string };
  safetyWindowMs: number;
  timeoutMs: number;
  fetch?: FetchLike;
  now?: () => number;
};

type Grant = 'password' | 'refresh_token';

export class AuthSession {
  private readonly options: AuthSessionOptions;

  private readonly fetchImpl: FetchLike;

  private readonly now: () => number;

  private token: AccessToken | null = null;

  private refreshToken: string | null = null;

  private inFlight: Promise<AccessToken> | null = null;

  constructor(options: AuthSessionOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns a token that stays valid for at least the safety window. Callers arriving while
   * an exchange is running share its result.
   */
  getValidToken(): Promise<AccessToken> {
    const current = this.token;
    if (current && this.isUsable(current)) {
      return Promise.resolve(current);
    }

    if (!this.inFlight) {
      this.inFlight = this.exchange().finally(() => {
        this.inFlight = null;
      });
    }

    return this.inFlight;
  }

  /** Drops the cached access token after the upstream rejected it. The refresh token stays. */
  invalidate(): void {
    if (this.token) {
      logger.debug({ expiresAt: new Date(this.token.expiresAt).toISOString() }, 'access token invalidated');
    }
    this.token = null;
  }

  get tokenExpiresAt(): string | null {
    return this.token ? new Date(this.token.expiresAt).toISOString() : null;
  }

  private isUsable(token: AccessToken): boolean {
    return token.expiresAt - this.options.safetyWindowMs > this.now();
  }

  private async exchange(): Promise<AccessToken> {
    this.token = null;

    if (this.refreshToken) {
      try {
        return await this.requestToken('refresh_token', {
          grant_type: 'refresh_token',
          client_id: this.options.clientId,
          refresh_token: this.refreshToken,
        });
      } catch (error) {
        if (error instanceof AuthError && error.reason === 'network') {
          throw error;
        }

        logger.warn(
          { reason: error instanceof AuthError ? error.reason : 'unknown' },
          'refresh grant rejected; falling back to password grant',
        );
        this.refreshToken = null;
      }
    }

    return this.requestToken('password', {
      grant_type: 'password',
      client_id: this.options.clientId,
      audience: this.options.audience,
      scope: SCOPE,
      username: this.options.credentials.email,
      password: this.options.credentials.password,
    });
  }

  private async requestToken(grant: Grant, body: Record<string, string>): Promise<AccessToken> {
    const url = `https://${this.options.domain}/oauth/token`;

    let response: TextResponse;
    try {
      response = await fetchText(
        this.fetchImpl,
        url,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
          body: JSON.stringify(body),
        },
        { timeoutMs: this.options.timeoutMs },
      );
    } catch (error) {
      const message = error instanceof RequestFailure ? error.message : String(error);
      logger.error({ grant, err: message }, 'credential exchange unreachable');
      throw new AuthError('network', `Credential exchange failed: ${message}`);
    }

    if (!response.ok) {
      logger.error({ grant, status: response.status }, 'credential exchange rejected');
      if (response.status === 400 || response.status === 401 || response.status === 403) {
        throw new AuthError(
          'invalid_credentials',
          grant === 'password'
            ? 'VinFast rejected the configured credentials. Re-enter the account email and password.'
            : 'VinFast rejected the stored refresh token.',
          response.status,
        );
      }

      throw new AuthError(
        'upstream',
        `Credential exchange failed with HTTP ${response.status}`,
        response.status,
      );
    }

    const json = parseJson(response.text);
    const parsed = json.ok ? tokenResponseSchema.safeParse(json.value) : null;
    if (!parsed || !parsed.success) {
      logger.error({ grant, status: response.status }, 'credential exchange returned an unusable body');
      throw new AuthError('malformed', 'Credential exchange response did not contain an access token');
    }

    const lifetimeSeconds = parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
    if (lifetimeSeconds * 1000 <= this.options.safetyWindowMs) {
      throw new AuthError(
        'malformed',
        `Issued token lives ${lifetimeSeconds}s, shorter than the refresh safety window`,
      );
    }

    const token: AccessToken = Object.freeze({
      value: parsed.data.access_token,
      expiresAt: this.now() + lifetimeSeconds * 1000,
    });

    this.token = token;
    this.refreshToken = parsed.data.refresh_token ?? this.refreshToken;

    logger.info(
      {
        grant,
        expiresAt: new Date(token.expiresAt).toISOString(),
        hasRefresh: this.refreshToken !== null,
      },
      'access token refreshed',
    );

    return token;
  }
}
