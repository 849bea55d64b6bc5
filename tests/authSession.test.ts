import { beforeEach, describe, expect, it } from 'vitest';

import { AuthSession } from '../src/services/authSession.service';
import { MockVinfastUpstream } from '../src/simulation/vinfastUpstream.mock';
import { AuthError } from '../src/utils/errors';

const T0 = Date.parse('2024-05-01T12:00:00Z');

describe('AuthSession', () => {
  let upstream: MockVinfastUpstream;
  let clock: number;

  const createSession = (target: MockVinfastUpstream = upstream) =>
    new AuthSession({
      domain: target.authDomain,
      clientId: 'test-client',
      audience: `https://${target.authDomain}/api/v2/`,
      credentials: { email: 'driver@example.test', password: 'test-secret' },
      safetyWindowMs: 60_000,
      timeoutMs: 1_000,
      fetch: target.fetch,
      now: () => clock,
    });

  beforeEach(() => {
    upstream = new MockVinfastUpstream();
    clock = T0;
  });

  it('logs in with the password grant and caches the token', async () => {
    const session = createSession();

    const first = await session.getValidToken();
    const second = await session.getValidToken();

    expect(first.value).toBe('test-access-1');
    expect(first.expiresAt).toBe(T0 + 3_600_000);
    expect(second).toBe(first);
    expect(upstream.grants).toEqual(['password']);
    expect(session.tokenExpiresAt).toBe('2024-05-01T13:00:00.000Z');
  });

  it('runs a single exchange for concurrent callers', async () => {
    const session = createSession();

    const tokens = await Promise.all([
      session.getValidToken(),
      session.getValidToken(),
      session.getValidToken(),
      session.getValidToken(),
      session.getValidToken(),
    ]);

    expect(upstream.calls.token).toBe(1);
    expect(new Set(tokens.map((token) => token.value))).toEqual(new Set(['test-access-1']));
  });

  it('refreshes once the token enters the safety window', async () => {
    const session = createSession();
    await session.getValidToken();

    clock = T0 + 3_600_000 - 60_001;
    expect((await session.getValidToken()).value).toBe('test-access-1');

    clock = T0 + 3_600_000 - 60_000;
    const refreshed = await session.getValidToken();

    expect(refreshed.value).toBe('test-access-2');
    expect(upstream.grants).toEqual(['password', 'refresh_token']);
  });

  it('falls back to the password grant when the refresh token is rejected', async () => {
    const session = createSession();
    await session.getValidToken();

    upstream.failNext('token', 401);
    session.invalidate();
    const token = await session.getValidToken();

    expect(token.value).toBe('test-access-2');
    expect(upstream.calls.token).toBe(3);
    expect(upstream.grants).toEqual(['password', 'password']);
  });

  it('uses the refresh grant after invalidate', async () => {
    const session = createSession();
    await session.getValidToken();

    session.invalidate();
    expect(session.tokenExpiresAt).toBeNull();

    await session.getValidToken();
    expect(upstream.grants).toEqual(['password', 'refresh_token']);
  });

  it('reports rejected credentials without caching anything', async () => {
    upstream.rejectCredentials = true;
    const session = createSession();

    const error = await session.getValidToken().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ reason: 'invalid_credentials', status: 403 });
    expect(session.tokenExpiresAt).toBeNull();
  });

  it('reports network failures and recovers on the next call', async () => {
    const session = createSession();
    upstream.failNext('token', 'network');

    await expect(session.getValidToken()).rejects.toMatchObject({ reason: 'network' });

    const token = await session.getValidToken();
    expect(token.value).toBe('test-access-1');
    expect(upstream.calls.token).toBe(2);
  });

  it('classifies server errors and unusable bodies', async () => {
    const session = createSession();

    upstream.failNext('token', 503);
    await expect(session.getValidToken()).rejects.toMatchObject({ reason: 'upstream', status: 503 });

    upstream.failNext('token', 'malformed');
    await expect(session.getValidToken()).rejects.toMatchObject({ reason: 'malformed' });
  });

  it('rejects tokens that expire inside the safety window', async () => {
    const shortLived = new MockVinfastUpstream({ tokenLifetimeSeconds: 30 });
    const session = createSession(shortLived);

    await expect(session.getValidToken()).rejects.toMatchObject({ reason: 'malformed' });
    expect(session.tokenExpiresAt).toBeNull();
  });
});
