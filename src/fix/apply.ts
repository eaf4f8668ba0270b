/**
 * @module fix/apply
 *
 * Applies analyzer fixes to the buffer the analyzer saw.
 *
 * All edit offsets refer to that original buffer. Edits are sorted, checked to
 * be pairwise disjoint and then copied into a new buffer in one forward pass,
 * so no offset ever needs shifting. The result cannot be fed back with the same
 * fixes: run the analyzer again to get offsets for the new text.
 */

import type { Diagnostic, Edit, Fix } from '../diagnostics/diagnostics.js';
import { ConflictingEditsError, OutOfBoundsError } from '../diagnostics/errors.js';
import { SourceIndex } from '../source/source-index.js';

function checkEdit(index: SourceIndex, edit: Edit): void {
  const { start, end } = edit.span;
  index.checkOffset(start);
  index.checkOffset(end);
  if (start > end) {
    throw new OutOfBoundsError(`Edit starts at ${start} after its end ${end}`, { offset: start, limit: end });
  }
}

/**
 * Returns the edits sorted by start, then end. The sort is stable, so two
 * insertions at the same offset keep the order they were given in.
 */
export function sortEdits(edits: readonly Edit[]): Edit[] {
  return [...edits].sort((a, b) => a.span.start - b.span.start || a.span.end - b.span.end);
}

/** Throws {@link ConflictingEditsError} for the first overlapping pair. */
export function checkDisjoint(sorted: readonly Edit[]): void {
  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const next = sorted[i];
    if (previous && next && previous.span.end > next.span.start) {
      throw new ConflictingEditsError(previous, next);
    }
  }
}

export function applyEdits(source: string | Uint8Array | SourceIndex, edits: readonly Edit[]): Buffer {
  const index = source instanceof SourceIndex ? source : new SourceIndex(source);
  for (const edit of edits) checkEdit(index, edit);

  const sorted = sortEdits(edits);
  checkDisjoint(sorted);

  const chunks: Buffer[] = [];
  let cursor = 0;
  for (const edit of sorted) {
    chunks.push(index.bytes.subarray(cursor, edit.span.start));
    chunks.push(Buffer.from(edit.replacement, 'utf8'));
    cursor = edit.span.end;
  }
  chunks.push(index.bytes.subarray(cursor));
  return Buffer.concat(chunks);
}

export function applyFixes(source: string | Uint8Array | SourceIndex, fixes: readonly Fix[]): Buffer {
  return applyEdits(source, fixes.flatMap(fix => fix.edits));
}

/** The preferred (first) fix of every diagnostic that offers one. */
export function selectFixes(diagnostics: readonly Diagnostic[]): Fix[] {
  const selected: Fix[] = [];
  for (const diagnostic of diagnostics) {
    const fix = diagnostic.fixes[0];
    if (fix) selected.push(fix);
  }
  return selected;
}
