import type { SourceIndex } from '../source/source-index.js';

export const DEFAULT_TAB_WIDTH = 4;

/**
 * Display layout of one source line: its text with tabs expanded and a table
 * from byte offset (relative to the line start) to display column.
 *
 * Every code point is one column wide and a tab is `tabWidth` columns. Wide
 * East Asian characters and combining marks are counted as one column as well,
 * so alignment under such text is approximate.
 */
export interface LineLayout {
  readonly line: number;
  readonly text: string;
  readonly width: number;
  /** 0-based display column of `offset`; offsets past the text clamp to `width`. */
  column(offset: number): number;
}

function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

export function layoutLine(index: SourceIndex, line: number, tabWidth = DEFAULT_TAB_WIDTH): LineLayout {
  const start = index.lineStart(line);
  const raw = index.lineText(line);
  const columns: number[] = [];
  let expanded = '';
  let byte = 0;
  let col = 0;

  for (const char of raw) {
    const codePoint = char.codePointAt(0) ?? 0;
    columns[byte] = col;
    if (char === '\t') {
      expanded += ' '.repeat(tabWidth);
      col += tabWidth;
    } else {
      expanded += char;
      col += 1;
    }
    byte += utf8Length(codePoint);
  }
  columns[byte] = col;
  const width = col;

  return {
    line,
    text: expanded,
    width,
    column(offset: number): number {
      const relative = offset - start;
      if (relative >= byte) return width;
      if (relative <= 0) return 0;
      return columns[relative] ?? width;
    },
  };
}

/**
 * Lazily computes and caches layouts for the lines a report actually shows.
 */
export class LayoutCache {
  private readonly layouts = new Map<number, LineLayout>();

  constructor(
    private readonly index: SourceIndex,
    private readonly tabWidth = DEFAULT_TAB_WIDTH
  ) {}

  get(line: number): LineLayout {
    let layout = this.layouts.get(line);
    if (!layout) {
      layout = layoutLine(this.index, line, this.tabWidth);
      this.layouts.set(line, layout);
    }
    return layout;
  }

  get size(): number {
    return this.layouts.size;
  }
}
