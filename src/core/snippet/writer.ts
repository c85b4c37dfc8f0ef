import * as path from 'node:path';
import { writeFile } from '../../utils/file-system.js';
import type { SnippetWriter } from './types.js';

/**
 * Writes each snippet to `<outputDir>/<operation>/<snippet>.<extension>`.
 */
export class FileSnippetWriter implements SnippetWriter {
  constructor(
    private readonly outputDir: string,
    private readonly extension: string
  ) {}

  resolvePath(operationName: string, snippetName: string): string {
    return path.join(this.outputDir, operationName, `${snippetName}.${this.extension}`);
  }

  async write(operationName: string, snippetName: string, content: string): Promise<void> {
    await writeFile(this.resolvePath(operationName, snippetName), content);
  }
}
