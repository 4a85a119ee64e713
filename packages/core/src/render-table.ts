import type { Area } from './area.js';
import type { RenderContext } from './context.js';
import type { CellContext, CellDecorator } from './decorators.js';
import { LinearLayout, TableLayout, type Element, type TableRow } from './elements.js';
import { LayoutError } from './errors.js';
import { complete, continued, renderElement, type RenderOutcome } from './render.js';
import { NO_EDGES } from './units.js';

/** Column widths are snapped to multiples of 2^-16 mm. */
const WIDTH_GRID = 65536;

/**
 * Splits `available` between columns by weight. All but the last width are
 * snapped down to a binary grid so that their running sum is exact; the
 * last column takes the remainder, making the widths add up to exactly
 * `available`.
 */
export function columnWidths(available: number, weights: readonly number[]): number[] {
  const total = weights.reduce((sum, w) => sum + w, 0);
  if (!(total > 0)) throw new LayoutError('Column weights must not sum to zero');
  const widths: number[] = [];
  let assigned = 0;
  for (let i = 0; i < weights.length - 1; i++) {
    const width = Math.floor(((available * weights[i]) / total) * WIDTH_GRID) / WIDTH_GRID;
    widths.push(width);
    assigned += width;
  }
  widths.push(available - assigned);
  return widths;
}

interface RowLayout {
  height: number;
  /** False when no cell placed anything, so the row must move to the next page. */
  progress: boolean;
  /** What is left of the row when a cell continued. */
  remainder?: TableRow;
}

interface PlacedRow {
  y: number;
  height: number;
  cells: CellContext[];
}

function layoutRow(
  row: TableRow,
  area: Area,
  widths: number[],
  cells: CellContext[],
  ctx: RenderContext,
  decorator: CellDecorator | undefined,
): RowLayout {
  let x = 0;
  let height = 0;
  let progress = false;
  let pending = false;
  const remaining: Element[] = [];

  row.cells.forEach((cell, column) => {
    const insets = decorator?.insets(cells[column]) ?? NO_EDGES;
    const outcome = renderElement(cell, area.column(x, widths[column]).inset(insets), ctx);
    height = Math.max(height, insets.top + outcome.size.height + insets.bottom);
    if (outcome.status === 'complete') {
      if (outcome.size.height > 0) progress = true;
      remaining.push(LinearLayout.vertical());
    } else {
      if (outcome.continuation !== cell) progress = true;
      pending = true;
      remaining.push(outcome.continuation);
    }
    x += widths[column];
  });

  if (!pending) return { height, progress: true };
  return { height, progress, remainder: { ...row, cells: remaining } };
}

function resumeTable(table: TableLayout, consumed: number, rows: TableRow[]): TableLayout {
  const next = new TableLayout(table.columnWeights, { rowOffset: (table.resume?.rowOffset ?? 0) + consumed });
  next.rows.push(...rows);
  if (table.cellDecorator) next.setCellDecorator(table.cellDecorator);
  return next;
}

/**
 * Places rows top to bottom. A row is measured without drawing first so
 * its background can be painted beneath the cells. A row whose cells all
 * fail to place anything moves whole to the next page; otherwise it is
 * split and the unfinished cells continue there.
 */
export function renderTable(table: TableLayout, area: Area, ctx: RenderContext): RenderOutcome {
  const widths = columnWidths(area.width, table.columnWeights);
  const decorator = table.cellDecorator;
  const rowOffset = table.resume?.rowOffset ?? 0;
  const reserve = decorator?.closingHeight() ?? 0;
  const rows = area.region({ x: 0, y: 0, width: area.width, height: area.height - reserve });

  const placed: PlacedRow[] = [];
  let continuation: TableLayout | undefined;

  for (let i = 0; i < table.rows.length; i++) {
    const row = table.rows[i];
    const cells = row.cells.map((_, column): CellContext => ({
      row: rowOffset + i,
      column,
      columnCount: table.columnCount,
      resumesTable: table.resume !== undefined && i === 0,
    }));

    const measured = layoutRow(row, rows.dryRun(), widths, cells, ctx, decorator);
    if (!measured.progress) {
      continuation = resumeTable(table, i, table.rows.slice(i));
      break;
    }

    const region = rows.rest();
    if (row.backgroundColor) {
      region.drawRect(
        { x: 0, y: 0, width: area.width, height: Math.min(measured.height, region.height) },
        { fill: row.backgroundColor },
      );
    }
    const laid = layoutRow(row, region, widths, cells, ctx, decorator);
    placed.push({ y: rows.cursor, height: laid.height, cells });
    rows.advance(laid.height);

    if (laid.remainder) {
      continuation = resumeTable(table, i, [laid.remainder, ...table.rows.slice(i + 1)]);
      break;
    }
  }

  if (placed.length === 0 && continuation) return continued(area.width, 0, table);

  if (decorator) {
    for (const row of placed) {
      let x = 0;
      row.cells.forEach((cell, column) => {
        decorator.decorateCell(cell, rows.region({ x, y: row.y, width: widths[column], height: row.height }));
        x += widths[column];
      });
    }
  }

  let height = rows.cursor;
  if (decorator && placed.length > 0) {
    const closing = area.region({ x: 0, y: height, width: area.width, height: area.height - height });
    height += decorator.closeTable(closing, continuation === undefined);
  }

  if (continuation) return continued(area.width, height, continuation);
  return complete(area.width, height);
}
