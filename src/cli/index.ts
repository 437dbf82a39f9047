/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCompileCommand } from './commands/compile.js';
import { createStatusCommand } from './commands/status.js';
import { createKeyCommand } from './commands/key.js';
import { createClearCommand } from './commands/clear.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('sonar')
    .description('Cached stylesheet aggregation and compilation')
    .version(readVersion());
  [createCompileCommand, createStatusCommand, createKeyCommand, createClearCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
