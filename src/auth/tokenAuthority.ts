import type { HttpTransport } from '../http/transport.js';
import {
  CONTENT_TYPE_FORM,
  CONTENT_TYPE_HEADER,
  decodeJson,
  execute,
  type RequestOptions,
} from '../http/request.js';
import { tokenResponseSchema, type TokenResponse } from '../schemas/tokenSchemas.js';
import logger from '../utils/logger.js';

export const AUTHORIZATION_ENDPOINT = 'https://accounts.google.com/o/oauth2/v2/auth';
export const TOKEN_ENDPOINT = 'https://www.googleapis.com/oauth2/v4/token';

/** Out-of-band redirect: the provider shows the code to the user */
export const OOB_REDIRECT_URI = 'urn:ietf:wg:oauth:2.0:oob';
const RESPONSE_TYPE = 'code';
const ACCESS_TYPE = 'offline';
const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code';
const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token';

export interface Credentials {
  readonly clientId: string;
  readonly clientSecret: string;
}

/**
 * Token state held by a TokenAuthority.
 */
export interface TokenState {
  accessToken: string;
  /** Seconds from issue, as reported by the provider */
  accessTokenExpiresIn: number;
  refreshToken: string;
  /** Requested scopes joined by a single space */
  scope: string;
}

export interface TokenAuthorityOptions {
  credentials: Credentials;
  scopes: readonly string[];
  transport: HttpTransport;
  /** Access token to start from, e.g. one obtained in an earlier run */
  accessToken?: string;
  authorizationEndpoint?: string;
  tokenEndpoint?: string;
}

/**
 * Drives the OAuth2 desktop flow: consent URL, code exchange and refresh.
 *
 * Not safe for concurrent use; each instance owns its token state and every
 * operation mutates it in place.
 */
export class TokenAuthority {
  private readonly credentials: Credentials;
  private readonly transport: HttpTransport;
  private readonly authorizationEndpoint: string;
  private readonly tokenEndpoint: string;
  private readonly state: TokenState;

  constructor(options: TokenAuthorityOptions) {
    this.credentials = { ...options.credentials };
    this.transport = options.transport;
    this.authorizationEndpoint = options.authorizationEndpoint ?? AUTHORIZATION_ENDPOINT;
    this.tokenEndpoint = options.tokenEndpoint ?? TOKEN_ENDPOINT;
    this.state = {
      accessToken: options.accessToken ?? '',
      accessTokenExpiresIn: 0,
      refreshToken: '',
      scope: options.scopes.join(' '),
    };
  }

  /**
   * Builds the consent page URL the user opens in a browser.
   */
  buildAuthorizationUrl(): string {
    const params = new URLSearchParams({
      client_id: this.credentials.clientId,
      redirect_uri: OOB_REDIRECT_URI,
      scope: this.state.scope,
      access_type: ACCESS_TYPE,
      response_type: RESPONSE_TYPE,
    });
    return `${this.authorizationEndpoint}?${params.toString()}`;
  }

  /**
   * Exchanges an authorization code for tokens and replaces the stored access
   * token, expiry and refresh token.
   *
   * The provider only issues a refresh token on the first consent; when the
   * answer has none, {@link hasRefreshToken} returns false and the consent step
   * has to be repeated.
   *
   * @throws NetworkError or ProtocolError; stored tokens are unchanged on failure.
   */
  async exchangeCode(code: string, options: RequestOptions = {}): Promise<void> {
    const response = await this.requestToken(
      new URLSearchParams({
        code,
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        redirect_uri: OOB_REDIRECT_URI,
        grant_type: GRANT_TYPE_AUTHORIZATION_CODE,
        access_type: ACCESS_TYPE,
      }),
      'authorization code exchange',
      options,
    );

    this.state.accessToken = response.access_token ?? '';
    this.state.accessTokenExpiresIn = response.expires_in ?? 0;
    this.state.refreshToken = response.refresh_token ?? '';
  }

  /**
   * Mints a new access token from a refresh token.
   *
   * Fields missing from the answer keep their previous values: an absent
   * access token leaves the stored one, and an absent refresh token keeps the
   * one passed in.
   *
   * @throws NetworkError or ProtocolError; stored tokens are unchanged on failure.
   */
  async refreshAccessToken(refreshToken: string, options: RequestOptions = {}): Promise<void> {
    const response = await this.requestToken(
      new URLSearchParams({
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        grant_type: GRANT_TYPE_REFRESH_TOKEN,
        refresh_token: refreshToken,
      }),
      'access token refresh',
      options,
    );

    if (response.access_token) {
      this.state.accessToken = response.access_token;
      this.state.accessTokenExpiresIn = response.expires_in ?? 0;
    }
    this.state.refreshToken = response.refresh_token || refreshToken;
  }

  getAccessToken(): string {
    return this.state.accessToken;
  }

  getRefreshToken(): string {
    return this.state.refreshToken;
  }

  getAccessTokenExpiresIn(): number {
    return this.state.accessTokenExpiresIn;
  }

  getScope(): string {
    return this.state.scope;
  }

  hasRefreshToken(): boolean {
    return this.state.refreshToken !== '';
  }

  /**
   * Returns a copy of the current token state.
   */
  getState(): Readonly<TokenState> {
    return { ...this.state };
  }

  private async requestToken(
    form: URLSearchParams,
    context: string,
    options: RequestOptions,
  ): Promise<TokenResponse> {
    logger.debug(`POST ${this.tokenEndpoint} (${form.get('grant_type')})`);

    const body = await execute(
      this.transport,
      {
        method: 'POST',
        url: this.tokenEndpoint,
        headers: { [CONTENT_TYPE_HEADER]: CONTENT_TYPE_FORM },
        body: form.toString(),
        signal: options.signal,
      },
      context,
    );

    return decodeJson(body, tokenResponseSchema, context);
  }
}
