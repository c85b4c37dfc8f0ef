/**
 * File system helpers used by the loaders and the snippet writer.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating missing parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * File name without directory and extension, e.g. `captures/list-users.yaml` -> `list-users`.
 */
export function baseName(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}
