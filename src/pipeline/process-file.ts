/**
 * Per-file pipeline: analyzer output → diagnostics → filtered → rendered report,
 * and optionally the fixed buffer.
 *
 * Failures stay local: a malformed payload only affects its own file, a span
 * outside the buffer only skips its own diagnostic, and conflicting fixes leave
 * the file untouched. Each of them ends up in `warnings` or `fixError`.
 */

import type { Diagnostic } from '../diagnostics/diagnostics.js';
import { ConflictingEditsError, MalformedInputError, OutOfBoundsError } from '../diagnostics/errors.js';
import { selectDiagnostics } from '../diagnostics/filter.js';
import { parseAnalyzerOutput } from '../diagnostics/payload.js';
import { applyFixes, selectFixes } from '../fix/apply.js';
import { DiagnosticRenderer, type RenderOptions } from '../render/renderer.js';
import { SourceIndex } from '../source/source-index.js';
import { createLogger } from '../utils/logger.js';

export interface FileInput {
  readonly file: string;
  readonly source: string | Uint8Array;
  /** Raw JSON printed by the analyzer for this file. */
  readonly payload: string;
}

export interface ProcessOptions {
  readonly ignore: ReadonlySet<string>;
  readonly variableLookup: boolean;
  readonly fix: boolean;
  readonly render?: RenderOptions;
}

export interface FileOutcome {
  readonly file: string;
  /** Diagnostics left after filtering, in analyzer order. */
  readonly diagnostics: readonly Diagnostic[];
  /** Rendered reports of this file joined into one block ('' when there are none). */
  readonly report: string;
  readonly warnings: readonly string[];
  /** Corrected buffer, present when fixes were applied. */
  readonly fixed?: Buffer;
  readonly fixError?: ConflictingEditsError | OutOfBoundsError;
  readonly malformed?: MalformedInputError;
}

const logger = createLogger('pipeline');

export function processFile(input: FileInput, options: ProcessOptions): FileOutcome {
  let parsed: Diagnostic[];
  try {
    parsed = parseAnalyzerOutput(input.payload, input.file);
  } catch (err: unknown) {
    if (err instanceof MalformedInputError) {
      logger.debug('analyzer output rejected', { file: input.file, details: err.details });
      return {
        file: input.file,
        diagnostics: [],
        report: '',
        warnings: [err.message],
        malformed: err,
      };
    }
    throw err;
  }

  const diagnostics = selectDiagnostics(parsed, options);
  logger.debug('diagnostics selected', {
    file: input.file,
    received: parsed.length,
    kept: diagnostics.length,
  });

  const index = new SourceIndex(input.source);
  const renderer = new DiagnosticRenderer(index, options.render);
  const blocks: string[] = [];
  const warnings: string[] = [];
  for (const diagnostic of diagnostics) {
    try {
      blocks.push(renderer.render(diagnostic));
    } catch (err: unknown) {
      if (err instanceof OutOfBoundsError) {
        warnings.push(`skipped [${diagnostic.id}] in ${input.file}: ${err.message}`);
        continue;
      }
      throw err;
    }
  }

  const outcome = {
    file: input.file,
    diagnostics,
    report: blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '',
    warnings,
  };

  if (!options.fix) return outcome;
  const fixes = selectFixes(diagnostics);
  if (fixes.length === 0) return outcome;

  try {
    return { ...outcome, fixed: applyFixes(index, fixes) };
  } catch (err: unknown) {
    if (err instanceof ConflictingEditsError || err instanceof OutOfBoundsError) {
      logger.debug('fixes not applied', { file: input.file, reason: err.message });
      return { ...outcome, warnings: [...warnings, `fixes not applied to ${input.file}: ${err.message}`], fixError: err };
    }
    throw err;
  }
}
