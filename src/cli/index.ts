import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createCheckCommand } from './commands/check.js';
import { createDocumentCommand } from './commands/document.js';

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
    .name('paramdoc')
    .description('Verify and document API request parameters')
    .version(readVersion());
  [createCheckCommand, createDocumentCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
