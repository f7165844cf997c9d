import assert from 'node:assert/strict';
import { PassThrough } from 'node:stream';
import { test } from 'node:test';
import { createConsolePrompt } from '../src/auth/prompt.js';

test('shows the consent URL and returns the typed code', async () => {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });

  const prompt = createConsolePrompt(input, output);
  const pending = prompt.askForCode('https://accounts.example.com/consent?client_id=abc');
  input.write('4/code-from-browser\n');

  assert.equal(await pending, '4/code-from-browser');
  assert.ok(written.startsWith('Open in your web browser:\nhttps://accounts.example.com/consent?client_id=abc\n\n'));
  assert.ok(written.includes('Input authorization code > '));
});
