import * as fs from 'fs';
import { MAX_PREVIEW_LINE_BYTES } from '@strata/protocol';

const CHUNK_SIZE = 4096;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Sequential line reader that can start over
 */
export interface LineSource {
  /** Next line without its terminator, or null at end of input */
  readLine(): string | null;
  rewind(): void;
}

/**
 * Reads lines from an open file descriptor with positional reads, so the
 * descriptor's own offset is never touched. Lines are split on `\n` with a
 * trailing `\r` dropped; a line longer than the limit is an error.
 */
export class LineScanner implements LineSource {
  private position = 0;
  private pending: Buffer = Buffer.alloc(0);
  private eof = false;
  private readonly chunk = Buffer.alloc(CHUNK_SIZE);

  constructor(
    private readonly fd: number,
    private readonly maxLineBytes: number = MAX_PREVIEW_LINE_BYTES
  ) {}

  readLine(): string | null {
    for (;;) {
      const newline = this.pending.indexOf(NEWLINE);
      if (newline !== -1) {
        return this.take(newline, newline + 1);
      }

      if (this.pending.length > this.maxLineBytes) {
        throw new Error('line too long');
      }

      if (this.eof) {
        return this.pending.length > 0 ? this.take(this.pending.length, this.pending.length) : null;
      }

      this.fill();
    }
  }

  rewind(): void {
    this.position = 0;
    this.pending = Buffer.alloc(0);
    this.eof = false;
  }

  private fill(): void {
    const bytesRead = fs.readSync(this.fd, this.chunk, 0, CHUNK_SIZE, this.position);
    if (bytesRead === 0) {
      this.eof = true;
      return;
    }
    this.position += bytesRead;
    this.pending = Buffer.concat([this.pending, this.chunk.subarray(0, bytesRead)]);
  }

  private take(lineEnd: number, consumed: number): string {
    let end = lineEnd;
    if (end > 0 && this.pending[end - 1] === CARRIAGE_RETURN) {
      end--;
    }
    if (end > this.maxLineBytes) {
      throw new Error('line too long');
    }
    const line = this.pending.subarray(0, end).toString('utf8');
    this.pending = this.pending.subarray(consumed);
    return line;
  }
}
