/**
 * Analyzer output parser
 *
 * Reads the JSON array printed by nixf-tidy for one file, validates it against
 * analyzer-output.schema.json and maps it onto the diagnostic model.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { DiagnosticBuilder, LabelRole, Severity, span, type Diagnostic, type Edit } from './diagnostics.js';
import { MalformedInputError } from './errors.js';
import type { ByteSpan } from '../types.js';

export interface RawCursor {
  readonly offset: number;
  readonly line?: number;
  readonly column?: number;
}

export interface RawRange {
  readonly lCur: RawCursor;
  readonly rCur: RawCursor;
}

export interface RawNote {
  readonly sname?: string;
  readonly message: string;
  readonly args?: readonly string[];
  readonly range: RawRange;
}

export interface RawEdit {
  readonly range: RawRange;
  readonly newText: string;
}

export interface RawFix {
  readonly message?: string;
  readonly edits: readonly RawEdit[];
}

export interface RawDiagnostic {
  readonly sname: string;
  readonly severity: number;
  readonly message: string;
  readonly args?: readonly string[];
  readonly range: RawRange;
  readonly notes?: readonly RawNote[];
  readonly fixes?: readonly RawFix[];
}

const SCHEMA_FILE = 'analyzer-output.schema.json';

// The schema lives at the project root: two levels above this file when run
// from sources, three when run from dist/.
const __dirname = dirname(fileURLToPath(import.meta.url));
const schemaPath =
  [join(__dirname, '..', '..', SCHEMA_FILE), join(__dirname, '..', '..', '..', SCHEMA_FILE)].find(candidate =>
    existsSync(candidate)
  ) ?? join(__dirname, '..', '..', SCHEMA_FILE);
const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

// ajv is CommonJS; under NodeNext its default import is module.exports
const Ajv = AjvModule.default;
const ajv = new Ajv({ strict: true, allErrors: true });
const validatePayload: ValidateFunction<RawDiagnostic[]> = ajv.compile<RawDiagnostic[]>(schema);

/** nixf severities: 0 fatal, 1 error, 2 warning, 3 info, 4 hint. */
export function mapSeverity(raw: number): Severity {
  switch (raw) {
    case 2:
      return Severity.Warning;
    case 3:
    case 4:
      return Severity.Note;
    default:
      return Severity.Error;
  }
}

/** Substitutes `{}` placeholders from left to right; extra placeholders stay. */
export function formatMessage(template: string, args: readonly string[] = []): string {
  const parts = template.split('{}');
  let result = parts[0] ?? '';
  for (let i = 1; i < parts.length; i++) {
    const arg = args[i - 1];
    result += (arg ?? '{}') + (parts[i] ?? '');
  }
  return result;
}

export function parseAnalyzerOutput(json: string, file: string): Diagnostic[] {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(file, [`JSON parse failed: ${message}`]);
  }

  if (!validatePayload(payload)) {
    throw new MalformedInputError(file, (validatePayload.errors ?? []).map(describeAjvError));
  }

  return payload.map((raw, index) => toDiagnostic(raw, file, index));
}

function toDiagnostic(raw: RawDiagnostic, file: string, index: number): Diagnostic {
  const builder = new DiagnosticBuilder()
    .withId(raw.sname)
    .withSeverity(mapSeverity(raw.severity))
    .withMessage(formatMessage(raw.message, raw.args))
    .withSpan(toSpan(raw.range, file));

  for (const note of raw.notes ?? []) {
    builder.withLabel(toSpan(note.range, file), formatMessage(note.message, note.args), LabelRole.Secondary);
  }

  for (const fix of raw.fixes ?? []) {
    const edits: Edit[] = fix.edits.map(edit => ({ span: toSpan(edit.range, file), replacement: edit.newText }));
    builder.withFix(fix.message ?? '', edits);
  }

  try {
    return builder.build();
  } catch (err: unknown) {
    if (err instanceof MalformedInputError) {
      throw new MalformedInputError(file, err.details.map(detail => `/${index}: ${detail}`));
    }
    throw err;
  }
}

function toSpan(range: RawRange, file: string): ByteSpan {
  return span(file, range.lCur.offset, range.rCur.offset);
}

function describeAjvError(error: ErrorObject): string {
  const where = error.instancePath || '/';
  return `${where} ${error.message ?? 'is invalid'}`;
}
