import type { CellDecorator } from './decorators.js';
import { LayoutError } from './errors.js';
import { DEFAULT_LINE_STYLE, type Color, type LineStyle, type Style } from './style.js';
import { expandEdges, type Edges } from './units.js';

export type Alignment = 'left' | 'center' | 'right';

/** A run of text with optional local style overrides. */
export interface StyledString {
  text: string;
  style?: Style;
}

// ── Element variants ───────────────────────────────────────────────

/** A single line of text; never wrapped. */
export interface TextElement {
  readonly type: 'Text';
  readonly content: StyledString;
}

/** Vertical space of `lines` times the current line height. */
export interface BreakElement {
  readonly type: 'Break';
  readonly lines: number;
}

/** Ends the current page. */
export interface PageBreakElement {
  readonly type: 'PageBreak';
}

export interface StyledElement {
  readonly type: 'Styled';
  readonly style: Style;
  readonly child: Element;
}

export interface FramedElement {
  readonly type: 'Framed';
  readonly lineStyle: LineStyle;
  readonly child: Element;
  /** Set on the continuation of a frame split across pages. */
  readonly openTop: boolean;
}

export interface PaddedElement {
  readonly type: 'Padded';
  readonly padding: Edges;
  readonly child: Element;
}

export type Element =
  | TextElement
  | Paragraph
  | LinearLayout
  | TableLayout
  | BreakElement
  | PageBreakElement
  | StyledElement
  | FramedElement
  | PaddedElement;

// ── Paragraph ──────────────────────────────────────────────────────

/**
 * Wrapped text made of one or more styled runs. Lines break at whitespace
 * only; adjacent runs without whitespace between them form one word.
 *
 * @example
 * ```ts
 * new Paragraph('Total: ').string('42.00', { bold: true }).aligned('right');
 * ```
 */
export class Paragraph {
  readonly type = 'Paragraph';
  readonly runs: StyledString[] = [];
  alignment: Alignment = 'left';

  constructor(text?: string, style?: Style) {
    if (text !== undefined) this.string(text, style);
  }

  static fromRuns(runs: StyledString[], alignment: Alignment = 'left'): Paragraph {
    const paragraph = new Paragraph();
    for (const run of runs) paragraph.string(run.text, run.style);
    return paragraph.aligned(alignment);
  }

  /** Appends a run. */
  string(text: string, style?: Style): this {
    this.runs.push(style ? { text, style } : { text });
    return this;
  }

  aligned(alignment: Alignment): this {
    this.alignment = alignment;
    return this;
  }
}

// ── LinearLayout ───────────────────────────────────────────────────

/** Children stacked top to bottom. */
export class LinearLayout {
  readonly type = 'LinearLayout';
  readonly direction = 'vertical';
  readonly children: Element[];

  constructor(children: Element[] = []) {
    this.children = children;
  }

  static vertical(children: Element[] = []): LinearLayout {
    return new LinearLayout(children);
  }

  push(element: Element): this {
    this.children.push(element);
    return this;
  }
}

// ── TableLayout ────────────────────────────────────────────────────

export interface TableRow {
  backgroundColor?: Color;
  cells: Element[];
}

export type PushResult = { ok: true } | { ok: false; error: LayoutError };

/** Where a continuation table sits within the table it was split from. */
export interface TableResume {
  rowOffset: number;
}

/**
 * Rows of cells in weighted columns. Column `i` receives
 * `weight[i] / sum(weights)` of the available width.
 */
export class TableLayout {
  readonly type = 'Table';
  readonly columnWeights: readonly number[];
  readonly rows: TableRow[] = [];
  cellDecorator?: CellDecorator;
  /** Present on the continuation of a table split across pages. */
  readonly resume?: TableResume;

  constructor(columnWeights: readonly number[], resume?: TableResume) {
    if (columnWeights.length === 0) {
      throw new LayoutError('A table needs at least one column');
    }
    if (columnWeights.some(w => !Number.isFinite(w) || w < 0)) {
      throw new LayoutError(`Column weights must be non-negative numbers, got [${columnWeights.join(', ')}]`);
    }
    if (columnWeights.reduce((sum, w) => sum + w, 0) <= 0) {
      throw new LayoutError('Column weights must not sum to zero');
    }
    this.columnWeights = [...columnWeights];
    this.resume = resume;
  }

  get columnCount(): number {
    return this.columnWeights.length;
  }

  setCellDecorator(decorator: CellDecorator): this {
    this.cellDecorator = decorator;
    return this;
  }

  row(): TableRowBuilder {
    return new TableRowBuilder(this);
  }

  pushRow(row: TableRow): PushResult {
    if (row.cells.length !== this.columnCount) {
      return {
        ok: false,
        error: new LayoutError(
          `Row has ${row.cells.length} cell(s) but the table has ${this.columnCount} column(s)`,
        ),
      };
    }
    this.rows.push({ ...row, cells: [...row.cells] });
    return { ok: true };
  }
}

export class TableRowBuilder {
  private readonly cells: Element[] = [];
  private backgroundColor?: Color;

  constructor(private readonly table: TableLayout) {}

  element(element: Element): this {
    this.cells.push(element);
    return this;
  }

  setBackgroundColor(color: Color): this {
    this.backgroundColor = color;
    return this;
  }

  /** Adds the row to the table unless its cell count is wrong. */
  push(): PushResult {
    const row: TableRow = { cells: this.cells };
    if (this.backgroundColor) row.backgroundColor = this.backgroundColor;
    return this.table.pushRow(row);
  }
}

// ── Factories ──────────────────────────────────────────────────────

export function text(content: string, style?: Style): TextElement {
  return { type: 'Text', content: style ? { text: content, style } : { text: content } };
}

export function lineBreak(lines = 1): BreakElement {
  return { type: 'Break', lines };
}

export function pageBreak(): PageBreakElement {
  return { type: 'PageBreak' };
}

export function styled(child: Element, style: Style): StyledElement {
  return { type: 'Styled', style, child };
}

export function framed(child: Element, lineStyle: LineStyle = DEFAULT_LINE_STYLE): FramedElement {
  return { type: 'Framed', lineStyle, child, openTop: false };
}

export function padded(child: Element, padding: number | Edges): PaddedElement {
  return { type: 'Padded', padding: expandEdges(padding), child };
}
