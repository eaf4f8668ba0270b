// Core type definitions shared by the index, renderer and fix engine

/** 1-based line and 1-based code-point column, derived from a byte offset. */
export interface Position {
  readonly line: number;
  readonly col: number;
}

/**
 * Half-open byte range `[start, end)` into the UTF-8 encoding of one source file.
 */
export interface ByteSpan {
  readonly file: string;
  readonly start: number;
  readonly end: number;
}
