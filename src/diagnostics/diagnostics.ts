// Structured analyzer diagnostics with labels and fixes

import type { ByteSpan } from '../types.js';
import { MalformedInputError } from './errors.js';

export enum Severity {
  Error = 'error',
  Warning = 'warning',
  Note = 'note',
}

export enum LabelRole {
  Primary = 'primary',
  Secondary = 'secondary',
}

export interface Label {
  readonly span: ByteSpan;
  readonly message: string;
  readonly role: LabelRole;
}

export interface Edit {
  readonly span: ByteSpan;
  readonly replacement: string;
}

export interface Fix {
  readonly message: string;
  readonly edits: readonly Edit[];
}

export interface Diagnostic {
  /** Stable analyzer identifier, e.g. `duplicated-attrname`; matched by `--ignore`. */
  readonly id: string;
  readonly severity: Severity;
  readonly message: string;
  readonly span: ByteSpan;
  readonly labels: readonly Label[];
  readonly fixes: readonly Fix[];
}

export class DiagnosticBuilder {
  private severity: Severity = Severity.Error;
  private id?: string;
  private message?: string;
  private span?: ByteSpan;
  private labels: Label[] = [];
  private fixes: Fix[] = [];

  static error(id: string): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(Severity.Error).withId(id);
  }

  static warning(id: string): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(Severity.Warning).withId(id);
  }

  static note(id: string): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(Severity.Note).withId(id);
  }

  withSeverity(severity: Severity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withId(id: string): DiagnosticBuilder {
    this.id = id;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: ByteSpan): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withLabel(span: ByteSpan, message: string, role: LabelRole = LabelRole.Secondary): DiagnosticBuilder {
    this.labels.push({ span, message, role });
    return this;
  }

  withFix(message: string, edits: readonly Edit[]): DiagnosticBuilder {
    this.fixes.push({ message, edits });
    return this;
  }

  build(): Diagnostic {
    if (!this.id) throw new Error('Diagnostic id is required');
    if (this.message === undefined) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    const file = this.span.file;
    const problems: string[] = [];
    const check = (span: ByteSpan, where: string): void => {
      if (span.file !== file) {
        problems.push(`${where} refers to ${span.file}, expected ${file}`);
      }
      if (span.start > span.end) {
        problems.push(`${where} starts at ${span.start} after its end ${span.end}`);
      }
    };
    check(this.span, 'span');
    this.labels.forEach((label, i) => check(label.span, `labels[${i}]`));
    this.fixes.forEach((fix, i) => fix.edits.forEach((edit, j) => check(edit.span, `fixes[${i}].edits[${j}]`)));
    if (problems.length > 0) {
      throw new MalformedInputError(file, problems);
    }

    return Object.freeze({
      id: this.id,
      severity: this.severity,
      message: this.message,
      span: freezeSpan(this.span),
      labels: Object.freeze(
        this.labels.map(label => Object.freeze({ ...label, span: freezeSpan(label.span) }))
      ),
      fixes: Object.freeze(
        this.fixes.map(fix =>
          Object.freeze({
            message: fix.message,
            edits: Object.freeze(
              fix.edits.map(edit => Object.freeze({ span: freezeSpan(edit.span), replacement: edit.replacement }))
            ),
          })
        )
      ),
    });
  }
}

function freezeSpan(span: ByteSpan): ByteSpan {
  return Object.freeze({ file: span.file, start: span.start, end: span.end });
}

export function span(file: string, start: number, end: number): ByteSpan {
  return { file, start, end };
}

const SEVERITY_TAGS: Record<Severity, string> = {
  [Severity.Error]: 'Error',
  [Severity.Warning]: 'Warning',
  [Severity.Note]: 'Note',
};

export function severityTag(severity: Severity): string {
  return SEVERITY_TAGS[severity];
}
