import { readFile } from 'fs/promises';

export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * File contents, or '' when the file does not exist (yet).
 */
export async function readOptionalFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFileError(err)) {
      return '';
    }
    throw err;
  }
}
