/**
 * FileTail: incremental line reader over a file another process appends to.
 *
 * Each read returns the complete lines written since the previous read; a
 * trailing partial line is held back until its newline arrives or `flush`
 * is requested after the writer exits.
 */

import { open, type FileHandle } from 'fs/promises';
import { StringDecoder } from 'string_decoder';

import { isMissingFileError } from './files.js';

export class FileTail {
  private offset = 0;
  private partial = '';
  private decoder = new StringDecoder('utf8');

  constructor(public readonly filePath: string) {}

  async readLines(flush = false): Promise<string[]> {
    const chunk = await this.readNewBytes();
    const text = this.partial + chunk;
    const parts = text.split('\n');
    this.partial = parts.pop() ?? '';

    if (flush && this.partial.length > 0) {
      parts.push(this.partial);
      this.partial = '';
    }

    return parts
      .map(line => line.replace(/\r$/, ''))
      .filter(line => line.length > 0);
  }

  private async readNewBytes(): Promise<string> {
    let handle: FileHandle;
    try {
      handle = await open(this.filePath, 'r');
    } catch (err) {
      if (isMissingFileError(err)) {
        return '';
      }
      throw err;
    }

    try {
      const { size } = await handle.stat();
      if (size < this.offset) {
        // Truncated by the writer; start over
        this.offset = 0;
        this.partial = '';
        this.decoder = new StringDecoder('utf8');
      }
      if (size === this.offset) {
        return '';
      }
      const length = size - this.offset;
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, this.offset);
      this.offset += bytesRead;
      return this.decoder.write(buffer.subarray(0, bytesRead));
    } finally {
      await handle.close();
    }
  }
}
