import assert from 'node:assert/strict';
import { beforeEach, describe, test } from 'node:test';
import {
  OOB_REDIRECT_URI,
  TOKEN_ENDPOINT,
  TokenAuthority,
} from '../src/auth/tokenAuthority.js';
import { NetworkError, ProtocolError } from '../src/utils/errors.js';
import { StubTransport } from './support/stubTransport.js';

const READONLY_SCOPE = 'https://www.googleapis.com/auth/photoslibrary.readonly';

function createAuthority(transport: StubTransport, scopes: string[] = [READONLY_SCOPE]): TokenAuthority {
  return new TokenAuthority({
    credentials: { clientId: 'client-123.apps.example', clientSecret: 'test-secret' },
    scopes,
    transport,
  });
}

describe('TokenAuthority.buildAuthorizationUrl', () => {
  test('returns the consent URL with every parameter percent-encoded', () => {
    const authority = createAuthority(new StubTransport());

    assert.equal(
      authority.buildAuthorizationUrl(),
      'https://accounts.google.com/o/oauth2/v2/auth' +
        '?client_id=client-123.apps.example' +
        '&redirect_uri=urn%3Aietf%3Awg%3Aoauth%3A2.0%3Aoob' +
        '&scope=https%3A%2F%2Fwww.googleapis.com%2Fauth%2Fphotoslibrary.readonly' +
        '&access_type=offline' +
        '&response_type=code',
    );
  });

  test('is pure and sends nothing', () => {
    const transport = new StubTransport();
    const authority = createAuthority(transport);

    assert.equal(authority.buildAuthorizationUrl(), authority.buildAuthorizationUrl());
    assert.equal(transport.requests.length, 0);
  });

  test('keeps the fixed parameters whatever the client id and scopes', () => {
    const authority = new TokenAuthority({
      credentials: { clientId: 'id with spaces&symbols', clientSecret: 'test-secret' },
      scopes: ['scope-a', 'scope-b'],
      transport: new StubTransport(),
    });

    const params = new URL(authority.buildAuthorizationUrl()).searchParams;
    assert.equal(params.get('client_id'), 'id with spaces&symbols');
    assert.equal(params.get('redirect_uri'), OOB_REDIRECT_URI);
    assert.equal(params.get('access_type'), 'offline');
    assert.equal(params.get('response_type'), 'code');
    assert.equal(params.get('scope'), 'scope-a scope-b');
    assert.equal(authority.getScope(), 'scope-a scope-b');
  });
});

describe('TokenAuthority.exchangeCode', () => {
  let transport: StubTransport;
  let authority: TokenAuthority;

  beforeEach(() => {
    transport = new StubTransport();
    authority = createAuthority(transport);
  });

  test('stores the access token, expiry and refresh token', async () => {
    transport.reply(200, { access_token: 'A', refresh_token: 'R', expires_in: 3600 });

    await authority.exchangeCode('auth-code');

    assert.equal(authority.getAccessToken(), 'A');
    assert.equal(authority.getRefreshToken(), 'R');
    assert.equal(authority.getAccessTokenExpiresIn(), 3600);
    assert.equal(authority.hasRefreshToken(), true);
  });

  test('posts the authorization_code grant as a form', async () => {
    transport.reply(200, { access_token: 'A', refresh_token: 'R', expires_in: 3600 });

    await authority.exchangeCode('auth-code');

    assert.equal(transport.requests.length, 1);
    const [request] = transport.requests;
    assert.equal(request.method, 'POST');
    assert.equal(request.url, TOKEN_ENDPOINT);
    assert.equal(request.headers['Content-Type'], 'application/x-www-form-urlencoded');
    assert.deepEqual(transport.formOf(0), {
      code: 'auth-code',
      client_id: 'client-123.apps.example',
      client_secret: 'test-secret',
      redirect_uri: OOB_REDIRECT_URI,
      grant_type: 'authorization_code',
      access_type: 'offline',
    });
  });

  test('an empty refresh token signals that consent must be repeated', async () => {
    transport.reply(200, { access_token: 'A', refresh_token: '', expires_in: 3600 });

    await authority.exchangeCode('auth-code');

    assert.equal(authority.getAccessToken(), 'A');
    assert.equal(authority.getRefreshToken(), '');
    assert.equal(authority.hasRefreshToken(), false);
  });

  test('rejects a wrongly typed payload with ProtocolError', async () => {
    transport.reply(200, { access_token: 42 });

    await assert.rejects(authority.exchangeCode('auth-code'), ProtocolError);
    assert.equal(authority.getAccessToken(), '');
  });

  test('reports the OAuth error of a non-2xx answer', async () => {
    transport.reply(400, { error: 'invalid_grant', error_description: 'Malformed auth code.' });

    await assert.rejects(authority.exchangeCode('auth-code'), (error: unknown) => {
      assert.ok(error instanceof ProtocolError);
      assert.equal(error.status, 400);
      assert.equal(
        error.message,
        'authorization code exchange failed (400): invalid_grant: Malformed auth code.',
      );
      return true;
    });
  });
});

describe('TokenAuthority.refreshAccessToken', () => {
  let transport: StubTransport;
  let authority: TokenAuthority;

  beforeEach(async () => {
    transport = new StubTransport();
    authority = createAuthority(transport);
    transport.reply(200, { access_token: 'A1', refresh_token: 'R1', expires_in: 3600 });
    await authority.exchangeCode('auth-code');
  });

  test('keeps the refresh token when the answer has none', async () => {
    transport.reply(200, { access_token: 'A2' });

    await authority.refreshAccessToken('R1');

    assert.equal(authority.getAccessToken(), 'A2');
    assert.equal(authority.getRefreshToken(), 'R1');
  });

  test('posts the refresh_token grant as a form', async () => {
    transport.reply(200, { access_token: 'A2', expires_in: 1800 });

    await authority.refreshAccessToken('R1');

    assert.equal(transport.requests[1].url, TOKEN_ENDPOINT);
    assert.deepEqual(transport.formOf(1), {
      client_id: 'client-123.apps.example',
      client_secret: 'test-secret',
      grant_type: 'refresh_token',
      refresh_token: 'R1',
    });
    assert.equal(authority.getAccessTokenExpiresIn(), 1800);
  });

  test('keeps the access token when the answer has none', async () => {
    transport.reply(200, { refresh_token: 'R2' });

    await authority.refreshAccessToken('R1');

    assert.equal(authority.getAccessToken(), 'A1');
    assert.equal(authority.getAccessTokenExpiresIn(), 3600);
    assert.equal(authority.getRefreshToken(), 'R2');
  });

  test('stores a rotated refresh token', async () => {
    transport.reply(200, { access_token: 'A2', refresh_token: 'R2', expires_in: 3599 });

    await authority.refreshAccessToken('R1');

    assert.deepEqual(authority.getState(), {
      accessToken: 'A2',
      accessTokenExpiresIn: 3599,
      refreshToken: 'R2',
      scope: READONLY_SCOPE,
    });
  });

  test('an empty body fails with ProtocolError and leaves the tokens alone', async () => {
    transport.reply(200, '');

    await assert.rejects(authority.refreshAccessToken('R1'), ProtocolError);

    assert.equal(authority.getAccessToken(), 'A1');
    assert.equal(authority.getRefreshToken(), 'R1');
  });

  test('a malformed body fails with ProtocolError and leaves the tokens alone', async () => {
    transport.reply(200, '{"access_token": "A2"');

    await assert.rejects(authority.refreshAccessToken('R-other'), ProtocolError);

    assert.equal(authority.getAccessToken(), 'A1');
    assert.equal(authority.getRefreshToken(), 'R1');
  });

  test('a revoked token fails with ProtocolError', async () => {
    transport.reply(400, { error: 'invalid_grant', error_description: 'Token has been expired or revoked.' });

    await assert.rejects(authority.refreshAccessToken('R1'), (error: unknown) => {
      assert.ok(error instanceof ProtocolError);
      assert.equal(error.status, 400);
      return true;
    });
    assert.equal(authority.getRefreshToken(), 'R1');
  });

  test('a transport failure becomes a NetworkError', async () => {
    transport.fail(new Error('socket hang up'));

    await assert.rejects(authority.refreshAccessToken('R1'), (error: unknown) => {
      assert.ok(error instanceof NetworkError);
      assert.equal(error.kind, 'transport');
      assert.equal(error.message, 'access token refresh failed: socket hang up');
      return true;
    });
    assert.equal(authority.getAccessToken(), 'A1');
  });

  test('an aborted signal fails before anything is sent', async () => {
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      authority.refreshAccessToken('R1', { signal: controller.signal }),
      (error: unknown) => error instanceof NetworkError && error.cancelled,
    );
    assert.equal(transport.requests.length, 1);
  });
});
