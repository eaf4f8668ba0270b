// Error taxonomy for rendering, fixing and payload parsing

import type { ByteSpan } from '../types.js';

export type NixfReportErrorKind = 'OutOfBounds' | 'ConflictingEdits' | 'MalformedInput';

export abstract class NixfReportError extends Error {
  abstract readonly kind: NixfReportErrorKind;
}

export interface OutOfBoundsDetails {
  readonly offset?: number;
  readonly line?: number;
  /** Buffer length or line count the value was checked against. */
  readonly limit: number;
}

export class OutOfBoundsError extends NixfReportError {
  readonly kind = 'OutOfBounds' as const;
  readonly offset?: number;
  readonly line?: number;
  readonly limit: number;

  constructor(message: string, details: OutOfBoundsDetails) {
    super(message);
    this.name = 'OutOfBoundsError';
    this.limit = details.limit;
    if (details.offset !== undefined) this.offset = details.offset;
    if (details.line !== undefined) this.line = details.line;
  }
}

/** The span and replacement of one edit that took part in a conflict. */
export interface ConflictingEdit {
  readonly span: ByteSpan;
  readonly replacement: string;
}

export class ConflictingEditsError extends NixfReportError {
  readonly kind = 'ConflictingEdits' as const;
  readonly first: ConflictingEdit;
  readonly second: ConflictingEdit;

  constructor(first: ConflictingEdit, second: ConflictingEdit) {
    super(
      `Conflicting edits in ${first.span.file}: [${first.span.start}, ${first.span.end}) overlaps [${second.span.start}, ${second.span.end})`
    );
    this.name = 'ConflictingEditsError';
    this.first = first;
    this.second = second;
  }
}

export class MalformedInputError extends NixfReportError {
  readonly kind = 'MalformedInput' as const;
  readonly file: string;
  readonly details: readonly string[];

  constructor(file: string, details: readonly string[]) {
    super(`Malformed analyzer output for ${file}: ${details.join('; ')}`);
    this.name = 'MalformedInputError';
    this.file = file;
    this.details = details;
  }
}

export function isNixfReportError(error: unknown): error is NixfReportError {
  return error instanceof NixfReportError;
}
