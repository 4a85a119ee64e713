import type { Area } from './area.js';
import type { Element } from './elements.js';
import { DEFAULT_LINE_STYLE, type LineStyle } from './style.js';
import { expandEdges, NO_EDGES, type Edges, type Rect, type Size } from './units.js';

// ── Page decorators ────────────────────────────────────────────────

/**
 * Supplies the content region of each page and, optionally, a header
 * element rendered at the top of that region.
 */
export interface PageDecorator {
  /** Content region in millimetres from the page's top-left corner. */
  contentArea(page: number, pageSize: Size): Rect;
  /** Called afresh for every page, starting at 1. */
  header?(page: number): Element | undefined;
}

export type HeaderFn = (page: number) => Element | undefined;

export class SimplePageDecorator implements PageDecorator {
  private margins: Edges = NO_EDGES;
  private headerFn?: HeaderFn;

  setMargins(margins: number | Edges): this {
    this.margins = expandEdges(margins);
    return this;
  }

  setHeader(headerFn: HeaderFn): this {
    this.headerFn = headerFn;
    return this;
  }

  contentArea(_page: number, pageSize: Size): Rect {
    const { top, right, bottom, left } = this.margins;
    return {
      x: left,
      y: top,
      width: pageSize.width - left - right,
      height: pageSize.height - top - bottom,
    };
  }

  header(page: number): Element | undefined {
    return this.headerFn?.(page);
  }
}

// ── Cell decorators ────────────────────────────────────────────────

export interface CellContext {
  /** Row index within the whole table, across pages. */
  row: number;
  column: number;
  columnCount: number;
  /** First row on a page the table was continued onto. */
  resumesTable: boolean;
}

export interface CellBorders {
  top: boolean;
  right: boolean;
  bottom: boolean;
  left: boolean;
}

/**
 * Draws the decoration of table cells. `insets` reserves room inside the
 * cell before its content renders; `decorateCell` draws once the row height
 * is known; `closeTable` finishes the table below the last row on a page.
 */
export interface CellDecorator {
  insets(cell: CellContext): Edges;
  decorateCell(cell: CellContext, area: Area): void;
  /** Height `closeTable` may need, reserved while rows are placed. */
  closingHeight(): number;
  closeTable(area: Area, complete: boolean): number;
}

/**
 * Frame borders around cells.
 *
 * @param inner - borders between cells
 * @param outer - the border around the table
 * @param continuation - borders where the table is split across pages
 */
export class FrameCellDecorator implements CellDecorator {
  constructor(
    readonly inner: boolean,
    readonly outer: boolean,
    readonly continuation: boolean,
    readonly lineStyle: LineStyle = DEFAULT_LINE_STYLE,
  ) {}

  borders(cell: CellContext): CellBorders {
    let top = this.inner;
    if (cell.resumesTable) top = this.continuation;
    else if (cell.row === 0) top = this.outer;
    return {
      top,
      left: cell.column === 0 ? this.outer : this.inner,
      right: cell.column === cell.columnCount - 1 ? this.outer : false,
      bottom: false,
    };
  }

  insets(cell: CellContext): Edges {
    const t = this.lineStyle.thickness;
    const borders = this.borders(cell);
    return {
      top: borders.top ? t : 0,
      right: borders.right ? t : 0,
      bottom: 0,
      left: borders.left ? t : 0,
    };
  }

  decorateCell(cell: CellContext, area: Area): void {
    const t = this.lineStyle.thickness;
    const { width, height } = area;
    const borders = this.borders(cell);
    if (borders.top) area.drawLine({ x: 0, y: t / 2 }, { x: width, y: t / 2 }, this.lineStyle);
    if (borders.left) area.drawLine({ x: t / 2, y: 0 }, { x: t / 2, y: height }, this.lineStyle);
    if (borders.right) area.drawLine({ x: width - t / 2, y: 0 }, { x: width - t / 2, y: height }, this.lineStyle);
  }

  closingHeight(): number {
    return this.outer || this.continuation ? this.lineStyle.thickness : 0;
  }

  closeTable(area: Area, complete: boolean): number {
    const t = this.lineStyle.thickness;
    const draw = complete ? this.outer : this.continuation;
    if (!draw || !area.fits(t)) return 0;
    area.drawLine({ x: 0, y: t / 2 }, { x: area.width, y: t / 2 }, this.lineStyle);
    return t;
  }
}
