import type { AuthorizationPrompt } from './prompt.js';
import type { TokenAuthority } from './tokenAuthority.js';
import { AuthorizationError } from '../utils/errors.js';
import logger from '../utils/logger.js';

export interface AuthorizationFlowOptions {
  /** Stored refresh token; when empty the user is asked to consent */
  refreshToken?: string;
  prompt: AuthorizationPrompt;
  signal?: AbortSignal;
  /** Consent rounds allowed before giving up (default: 3) */
  maxAttempts?: number;
}

export interface AuthorizationResult {
  accessToken: string;
  refreshToken: string;
  /** True when the refresh token came from a consent round in this run */
  newRefreshToken: boolean;
}

/**
 * Runs consent rounds until the provider issues a refresh token.
 *
 * @returns The refresh token.
 * @throws AuthorizationError after `maxAttempts` rounds without one.
 */
async function obtainRefreshToken(
  authority: TokenAuthority,
  prompt: AuthorizationPrompt,
  maxAttempts: number,
  signal?: AbortSignal,
): Promise<string> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const code = (await prompt.askForCode(authority.buildAuthorizationUrl(), signal)).trim();
    if (!code) {
      logger.warn('No authorization code entered');
      continue;
    }

    logger.info('Authorizing...');
    await authority.exchangeCode(code, { signal });

    if (authority.hasRefreshToken()) {
      return authority.getRefreshToken();
    }

    // Only the first consent yields a refresh token; revoke access and try again
    logger.warn(
      `No refresh token was issued (attempt ${attempt}/${maxAttempts}). ` +
      'Remove the app from your account permissions and authorize again.',
    );
  }

  throw new AuthorizationError(`No refresh token was issued after ${maxAttempts} authorization attempt(s)`);
}

/**
 * Obtains a fresh access token, asking the user for consent when no refresh
 * token is stored.
 *
 * @param authority - The token authority owning the token state.
 * @param options - Stored refresh token, prompt and cancellation signal.
 * @returns The access and refresh tokens after the refresh.
 */
export async function authorize(
  authority: TokenAuthority,
  options: AuthorizationFlowOptions,
): Promise<AuthorizationResult> {
  let refreshToken = options.refreshToken?.trim() ?? '';
  const newRefreshToken = refreshToken === '';

  if (newRefreshToken) {
    refreshToken = await obtainRefreshToken(
      authority,
      options.prompt,
      options.maxAttempts ?? 3,
      options.signal,
    );
  }

  logger.info('Refreshing access token...');
  await authority.refreshAccessToken(refreshToken, { signal: options.signal });
  logger.info('Authorized!');

  return {
    accessToken: authority.getAccessToken(),
    refreshToken: authority.getRefreshToken(),
    newRefreshToken,
  };
}
