// src/core/output/JsonlWriter.ts

import * as fs from 'fs';
import * as path from 'path';

export type WriteMode = 'append' | 'overwrite';

/**
 * Line-at-a-time JSON Lines output. Each `write` reaches the file before it
 * returns, so a crash loses at most the line being written.
 */
export class JsonlWriter {
  private fd?: number;
  private linesWritten = 0;

  constructor(
    private filePath: string,
    private mode: WriteMode = 'append'
  ) {}

  open(): void {
    if (this.fd !== undefined) return;
    fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
    this.fd = fs.openSync(this.filePath, this.mode === 'append' ? 'a' : 'w');
  }

  write(line: string): void {
    if (this.fd === undefined) {
      throw new Error(`Writer for ${this.filePath} is not open`);
    }
    fs.writeSync(this.fd, `${line}\n`, null, 'utf-8');
    this.linesWritten++;
  }

  close(): void {
    if (this.fd === undefined) return;
    fs.closeSync(this.fd);
    this.fd = undefined;
  }

  get count(): number {
    return this.linesWritten;
  }

  get path(): string {
    return this.filePath;
  }
}
