/**
 * @module renderer
 *
 * Turns one diagnostic into a framed, source-annotated report:
 *
 * ```text
 * [duplicated-attrname] Error: duplicated attrname `a`
 *    ╭─[default.nix:1:10]
 *    │
 *  1 │ { a = 1; a = 1; }
 *    │   - previously declared here
 *    │          ^ duplicated attrname `a`
 * ───╯
 * ```
 *
 * Every line touched by the primary span or a label is shown once, in line
 * order; gaps between non-adjacent lines collapse into a single `·` row. Each
 * annotation gets its own underline row below the line where it ends, so
 * annotations sharing a line are drawn one after another and never merged.
 * Overlapping annotations on one line are therefore not deduplicated.
 */

import { severityTag, LabelRole, Severity, type Diagnostic } from '../diagnostics/diagnostics.js';
import { OutOfBoundsError } from '../diagnostics/errors.js';
import type { SourceIndex } from '../source/source-index.js';
import type { ByteSpan } from '../types.js';
import { AnsiColor, paint } from '../utils/ansi.js';
import { DEFAULT_TAB_WIDTH, LayoutCache } from './layout.js';

export const DEFAULT_INLINE_WIDTH = 80;

export const Glyphs = {
  primary: '^',
  secondary: '-',
  continuation: '~',
  bar: '│',
  elision: '·',
  frameTop: '╭─',
  frameBottom: '╯',
  rule: '─',
  connector: '╰── ',
} as const;

export interface RenderOptions {
  /** Columns a tab expands to (default 4). */
  readonly tabWidth?: number;
  /** Widest underline row that still carries its message inline (default 80). */
  readonly maxInlineWidth?: number;
  readonly color?: boolean;
}

interface Annotation {
  readonly span: ByteSpan;
  readonly message: string;
  readonly primary: boolean;
  readonly order: number;
}

interface UnderlineRow {
  readonly col: number;
  readonly length: number;
  readonly glyph: string;
  readonly primary: boolean;
  readonly message: string;
  readonly order: number;
}

const SEVERITY_COLORS: Record<Severity, AnsiColor> = {
  [Severity.Error]: AnsiColor.Red,
  [Severity.Warning]: AnsiColor.Yellow,
  [Severity.Note]: AnsiColor.Cyan,
};

function displayWidth(text: string): number {
  return [...text].length;
}

/**
 * Renders diagnostics of one file. Line layouts are computed on first use and
 * shared by every diagnostic rendered through the same instance.
 */
export class DiagnosticRenderer {
  private readonly layouts: LayoutCache;
  private readonly maxInlineWidth: number;
  private readonly color: boolean;

  constructor(
    private readonly index: SourceIndex,
    options: RenderOptions = {}
  ) {
    this.layouts = new LayoutCache(index, options.tabWidth ?? DEFAULT_TAB_WIDTH);
    this.maxInlineWidth = options.maxInlineWidth ?? DEFAULT_INLINE_WIDTH;
    this.color = options.color ?? false;
  }

  render(diagnostic: Diagnostic): string {
    const annotations: Annotation[] = [
      { span: diagnostic.span, message: diagnostic.message, primary: true, order: 0 },
      ...diagnostic.labels.map((label, i) => ({
        span: label.span,
        message: label.message,
        primary: label.role === LabelRole.Primary,
        order: i + 1,
      })),
    ];

    const rows = new Map<number, UnderlineRow[]>();
    const touched = new Set<number>();
    for (const annotation of annotations) {
      this.placeAnnotation(annotation, rows, touched);
    }

    const lines = [...touched].sort((a, b) => a - b);
    const gutterWidth = String(lines[lines.length - 1] ?? 1).length;
    const margin = ' '.repeat(gutterWidth + 2);
    const severityColor = SEVERITY_COLORS[diagnostic.severity];
    const location = this.index.locate(diagnostic.span.start);

    const out: string[] = [
      `[${diagnostic.id}] ${paint(`${severityTag(diagnostic.severity)}:`, severityColor, this.color)} ${diagnostic.message}`,
      `${margin}${Glyphs.frameTop}[${diagnostic.span.file}:${location.line}:${location.col}]`,
      `${margin}${Glyphs.bar}`,
    ];

    let previous: number | undefined;
    for (const line of lines) {
      if (previous !== undefined && line > previous + 1) {
        out.push(`${margin}${Glyphs.elision}`);
      }
      previous = line;

      const layout = this.layouts.get(line);
      const gutter = ` ${String(line).padStart(gutterWidth)} ${Glyphs.bar}`;
      out.push(layout.text.length > 0 ? `${gutter} ${layout.text}` : gutter);

      const lineRows = [...(rows.get(line) ?? [])].sort((a, b) => a.col - b.col || a.order - b.order);
      for (const row of lineRows) {
        out.push(...this.underline(row, margin, severityColor));
      }
    }

    out.push(`${Glyphs.rule.repeat(gutterWidth + 2)}${Glyphs.frameBottom}`);
    return out.join('\n');
  }

  private placeAnnotation(annotation: Annotation, rows: Map<number, UnderlineRow[]>, touched: Set<number>): void {
    const { start, end } = annotation.span;
    if (start > end) {
      throw new OutOfBoundsError(`Span start ${start} is after its end ${end}`, { offset: start, limit: end });
    }
    this.index.checkOffset(start);
    this.index.checkOffset(end);

    const glyph = annotation.primary ? Glyphs.primary : Glyphs.secondary;
    const startLine = this.index.lineOf(start);
    let endLine = this.index.lineOf(end);
    // a non-empty span ending at a line start stops on the previous line
    if (end > start && endLine > startLine && end === this.index.lineStart(endLine)) {
      endLine--;
    }

    const push = (line: number, row: Omit<UnderlineRow, 'order' | 'primary'>): void => {
      const list = rows.get(line) ?? [];
      list.push({ ...row, primary: annotation.primary, order: annotation.order });
      rows.set(line, list);
    };

    const first = this.layouts.get(startLine);
    const startCol = first.column(start);
    for (let line = startLine; line <= endLine; line++) touched.add(line);

    if (startLine === endLine) {
      const endCol = first.column(end);
      push(startLine, { col: startCol, length: Math.max(1, endCol - startCol), glyph, message: annotation.message });
      return;
    }

    push(startLine, { col: startCol, length: Math.max(1, first.width - startCol), glyph, message: '' });
    for (let line = startLine + 1; line < endLine; line++) {
      const width = this.layouts.get(line).width;
      push(line, { col: 0, length: Math.max(1, width), glyph: Glyphs.continuation, message: '' });
    }
    const last = this.layouts.get(endLine);
    push(endLine, { col: 0, length: Math.max(1, last.column(end)), glyph, message: annotation.message });
  }

  private underline(row: UnderlineRow, margin: string, severityColor: AnsiColor): string[] {
    const indent = ' '.repeat(row.col);
    const color = row.primary ? severityColor : AnsiColor.Blue;
    const run = paint(row.glyph.repeat(row.length), color, this.color);
    const prefix = `${margin}${Glyphs.bar} ${indent}`;
    if (row.message.length === 0) {
      return [`${prefix}${run}`];
    }
    if (row.col + row.length + 1 + displayWidth(row.message) <= this.maxInlineWidth) {
      return [`${prefix}${run} ${row.message}`];
    }
    return [`${prefix}${run}`, `${prefix}${Glyphs.connector}${row.message}`];
  }
}

export function renderDiagnostic(diagnostic: Diagnostic, index: SourceIndex, options: RenderOptions = {}): string {
  return new DiagnosticRenderer(index, options).render(diagnostic);
}
