#!/usr/bin/env node
// ============================================================================
// @mxqlint/cli - Executable
// ============================================================================

import { existsSync, readFileSync } from 'node:fs';
import process from 'node:process';
import { type CliIO, EXIT_USAGE, runCli } from './commands.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const io: CliIO = {
  cwd: process.cwd(),
  env: process.env,
  isTTY: process.stdout.isTTY === true,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  readStdin,
  readFile: (file) => readFileSync(file, 'utf-8'),
  exists: (file) => existsSync(file),
};

runCli(process.argv.slice(2), io)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : 'Unknown error'}\n`);
    process.exitCode = EXIT_USAGE;
  });
