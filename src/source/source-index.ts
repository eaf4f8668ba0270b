/**
 * @module source-index
 *
 * Line/column index over the UTF-8 bytes of one source file.
 *
 * The index is built once per file with a single scan for line starts and is
 * then shared read-only by every diagnostic of that file. Offsets are byte
 * offsets; columns are counted in code points, so a multi-byte character is one
 * column wide.
 */

import { OutOfBoundsError } from '../diagnostics/errors.js';
import type { Position } from '../types.js';

const LF = 0x0a;
const CR = 0x0d;

function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

export class SourceIndex {
  readonly bytes: Buffer;
  private readonly lineStarts: readonly number[];

  constructor(source: string | Uint8Array) {
    this.bytes = typeof source === 'string' ? Buffer.from(source, 'utf8') : Buffer.from(source);
    const starts = [0];
    for (let i = 0; i < this.bytes.length; i++) {
      if (this.bytes[i] === LF) starts.push(i + 1);
    }
    this.lineStarts = starts;
  }

  get length(): number {
    return this.bytes.length;
  }

  lineCount(): number {
    return this.lineStarts.length;
  }

  /**
   * Throws unless `offset` is an integer in `[0, length]` that does not fall
   * inside a multi-byte character.
   */
  checkOffset(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.length) {
      throw new OutOfBoundsError(`Offset ${offset} is outside the buffer (length ${this.length})`, {
        offset,
        limit: this.length,
      });
    }
    if (offset < this.length && isContinuationByte(this.byteAt(offset))) {
      throw new OutOfBoundsError(`Offset ${offset} splits a multi-byte character`, {
        offset,
        limit: this.length,
      });
    }
  }

  checkLine(line: number): void {
    if (!Number.isInteger(line) || line < 1 || line > this.lineCount()) {
      throw new OutOfBoundsError(`Line ${line} does not exist (${this.lineCount()} lines)`, {
        line,
        limit: this.lineCount(),
      });
    }
  }

  lineOf(offset: number): number {
    this.checkOffset(offset);
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.startOf(mid) <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo + 1;
  }

  columnOf(offset: number): number {
    const line = this.lineOf(offset);
    return this.countCodePoints(this.lineStart(line), offset) + 1;
  }

  locate(offset: number): Position {
    const line = this.lineOf(offset);
    return { line, col: this.countCodePoints(this.lineStart(line), offset) + 1 };
  }

  /** Inverse of {@link locate}. */
  offsetAt(line: number, col: number): number {
    this.checkLine(line);
    // last offset on this line: its '\n', or the end of the buffer
    const last = line < this.lineCount() ? this.startOf(line) - 1 : this.length;
    if (!Number.isInteger(col) || col < 1) {
      throw new OutOfBoundsError(`Column ${col} is not valid`, { line, limit: last });
    }
    let offset = this.lineStart(line);
    for (let remaining = col - 1; remaining > 0; remaining--) {
      if (offset >= last) {
        throw new OutOfBoundsError(`Column ${col} is past the end of line ${line}`, { line, limit: last });
      }
      offset++;
      while (offset < this.length && isContinuationByte(this.byteAt(offset))) offset++;
    }
    return offset;
  }

  lineStart(line: number): number {
    this.checkLine(line);
    return this.startOf(line - 1);
  }

  /** Offset just past the last byte of the line's text, before its terminator. */
  lineContentEnd(line: number): number {
    this.checkLine(line);
    if (line === this.lineCount()) return this.length;
    const newline = this.startOf(line) - 1;
    const start = this.startOf(line - 1);
    return newline > start && this.byteAt(newline - 1) === CR ? newline - 1 : newline;
  }

  lineText(line: number): string {
    return this.bytes.toString('utf8', this.lineStart(line), this.lineContentEnd(line));
  }

  slice(start: number, end: number): string {
    this.checkOffset(start);
    this.checkOffset(end);
    if (start > end) {
      throw new OutOfBoundsError(`Range start ${start} is after its end ${end}`, {
        offset: start,
        limit: end,
      });
    }
    return this.bytes.toString('utf8', start, end);
  }

  private startOf(index: number): number {
    return this.lineStarts[index] ?? this.length;
  }

  private byteAt(offset: number): number {
    return this.bytes[offset] ?? 0;
  }

  private countCodePoints(from: number, to: number): number {
    let count = 0;
    for (let i = from; i < to; i++) {
      if (!isContinuationByte(this.byteAt(i))) count++;
    }
    return count;
  }
}
