import * as readline from 'node:readline/promises';

/**
 * Shows the consent URL to a human and returns the code they paste back.
 */
export interface AuthorizationPrompt {
  askForCode(authorizationUrl: string, signal?: AbortSignal): Promise<string>;
}

/**
 * Prompt reading the authorization code from a terminal.
 *
 * @param input - Stream to read from, stdin by default.
 * @param output - Stream the URL and question are written to, stdout by default.
 */
export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): AuthorizationPrompt {
  return {
    async askForCode(authorizationUrl: string, signal?: AbortSignal): Promise<string> {
      const rl = readline.createInterface({ input, output });
      try {
        output.write(`Open in your web browser:\n${authorizationUrl}\n\n`);
        return await rl.question('Input authorization code > ', { signal });
      } finally {
        rl.close();
      }
    },
  };
}
