#!/usr/bin/env node
import { CommanderError } from 'commander';
import { parseSearchArguments } from './cli.js';
import { MediaSearchClient } from './api/client.js';
import { buildSearchRequest } from './api/search/requestBuilder.js';
import { collectMediaItems } from './api/services/mediaHarvestService.js';
import { authorize } from './auth/authorizationFlow.js';
import { createConsolePrompt } from './auth/prompt.js';
import { TokenAuthority } from './auth/tokenAuthority.js';
import { createAxiosTransport, createHttpClient } from './http/transport.js';
import config, { assertCredentials } from './utils/config.js';
import { describeError } from './utils/errors.js';
import logger from './utils/logger.js';
import { formatMediaItems } from './utils/output.js';

/**
 * Runs one harvest: authorize, search, print.
 */
async function main(argv: string[]): Promise<void> {
  const options = parseSearchArguments(argv);
  assertCredentials(config);

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted, cancelling...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const transport = createAxiosTransport(createHttpClient({ timeoutMs: config.http.timeoutMs }));

    const authority = new TokenAuthority({
      credentials: {
        clientId: config.google.clientId,
        clientSecret: config.google.clientSecret,
      },
      scopes: config.google.scopes,
      transport,
    });

    const tokens = await authorize(authority, {
      refreshToken: config.google.refreshToken,
      prompt: createConsolePrompt(),
      signal: controller.signal,
    });

    if (tokens.newRefreshToken) {
      logger.info(`Store this refresh token as GOOGLE_REFRESH_TOKEN: ${tokens.refreshToken}`);
    }
    logger.debug(`Access token expires in ${authority.getAccessTokenExpiresIn()}s`);

    const client = new MediaSearchClient(tokens.accessToken, { transport });
    const result = await collectMediaItems(client, buildSearchRequest(options), {
      maxPages: options.pages,
      signal: controller.signal,
    });

    const output = formatMediaItems(result.mediaItems, options.format);
    if (output) {
      process.stdout.write(`${output}\n`);
    }

    logger.info(`Collected ${result.mediaItems.length} item(s) from ${result.pages} page(s)`);
    if (result.nextPageToken) {
      logger.info('More results are available; raise --pages to fetch them');
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // Help and version output are not failures
    process.exitCode = error.exitCode;
    return;
  }
  logger.error(describeError(error));
  process.exitCode = 1;
});
