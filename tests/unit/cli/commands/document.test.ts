/**
 * Tests for the document command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    gray: (s: string) => s,
    blue: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
  },
}));

import { createDocumentCommand } from '../../../../src/cli/commands/document.js';
import { logger } from '../../../../src/utils/logger.js';

const DESCRIPTORS = `
snippets:
  - type: path-parameters
    parameters:
      - name: id
        description: User id
`;

describe('document command', () => {
  let tempDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'paramdoc-document-'));
    writeFileSync(join(tempDir, 'descriptors.yaml'), DESCRIPTORS);
    writeFileSync(join(tempDir, 'get-user.yaml'), 'request:\n  uri: /users/7\nurl_template: /users/{id}\n');
    writeFileSync(join(tempDir, 'list-users.yaml'), 'request:\n  uri: /users\nurl_template: /users\n');

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel('info');
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('defines its options', () => {
    const command = createDocumentCommand();

    expect(command.name()).toBe('document');
    expect(command.options.map((opt) => opt.long)).toEqual(['--output-dir', '--format', '--config']);
  });

  it('writes JSON snippets to the configured directory by default', async () => {
    await createDocumentCommand().parseAsync(['node', 'test', 'descriptors.yaml', 'get-user.yaml']);

    const file = join(tempDir, 'build', 'snippets', 'get-user', 'path-parameters.json');
    expect(JSON.parse(readFileSync(file, 'utf-8'))).toEqual({
      parameters: [{ name: 'id', description: 'User id' }],
      path: '/users/{id}',
    });
    expect(consoleLogSpy).toHaveBeenCalledWith(`✓ Wrote ${file}`);
  });

  it('honours --output-dir and --format', async () => {
    await createDocumentCommand().parseAsync([
      'node', 'test', 'descriptors.yaml', 'get-user.yaml', '-o', 'docs', '--format', 'human',
    ]);

    expect(readFileSync(join(tempDir, 'docs', 'get-user', 'path-parameters.txt'), 'utf-8')).toBe(
      ['path-parameters', 'Path: /users/{id}', '  Parameter  Description', '  id         User id'].join('\n')
    );
  });

  it('skips failing operations and exits with 1', async () => {
    await expect(
      createDocumentCommand().parseAsync(['node', 'test', 'descriptors.yaml', 'get-user.yaml', 'list-users.yaml'])
    ).rejects.toThrow('process.exit called');

    expect(existsSync(join(tempDir, 'build', 'snippets', 'get-user', 'path-parameters.json'))).toBe(true);
    expect(existsSync(join(tempDir, 'build', 'snippets', 'list-users'))).toBe(false);
    expect(process.exit).toHaveBeenCalledWith(1);
  });
});
