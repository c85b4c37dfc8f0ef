/**
 * Tests for the CLI program.
 */
import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('registers the check and document commands', () => {
    const program = createCli();

    expect(program.name()).toBe('paramdoc');
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['check', 'document']);
  });

  it('reports the package version', () => {
    const pkg = JSON.parse(readFileSync(new URL('../../../package.json', import.meta.url), 'utf-8'));

    expect(createCli().version()).toBe(pkg.version);
  });
});
