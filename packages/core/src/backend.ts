import { RenderBackendError } from './errors.js';
import type { Color, LineStyle, ResolvedStyle } from './style.js';
import type { Point, Rect, Size } from './units.js';

export type Paint = { fill: Color } | { stroke: LineStyle };

/**
 * Consumes positioned drawing primitives, page by page, and serializes them.
 * Coordinates are millimetres from the top-left corner of the current page;
 * a text position is the top-left corner of the line box.
 */
export interface RenderBackend {
  beginPage(size: Size): void;
  drawText(position: Point, text: string, style: ResolvedStyle): void;
  drawLine(start: Point, end: Point, lineStyle: LineStyle): void;
  drawRect(rect: Rect, paint: Paint): void;
  finish(): Promise<Uint8Array>;
}

/** The drawing half of a backend, as seen by an Area. */
export type Canvas = Pick<RenderBackend, 'drawText' | 'drawLine' | 'drawRect'>;

// ── Recording backend ──────────────────────────────────────────────

export type DrawOp =
  | { op: 'text'; position: Point; text: string; style: ResolvedStyle }
  | { op: 'line'; start: Point; end: Point; lineStyle: LineStyle }
  | { op: 'rect'; rect: Rect; paint: Paint };

export interface PageInfo {
  width: number;
  height: number;
  ops: DrawOp[];
}

export interface LayoutInfo {
  pages: PageInfo[];
}

/** Keeps every primitive in memory; `finish()` returns them as JSON. */
export class RecordingBackend implements RenderBackend {
  readonly pages: PageInfo[] = [];

  beginPage(size: Size): void {
    this.pages.push({ width: size.width, height: size.height, ops: [] });
  }

  drawText(position: Point, text: string, style: ResolvedStyle): void {
    this.current().push({ op: 'text', position: { ...position }, text, style });
  }

  drawLine(start: Point, end: Point, lineStyle: LineStyle): void {
    this.current().push({ op: 'line', start: { ...start }, end: { ...end }, lineStyle });
  }

  drawRect(rect: Rect, paint: Paint): void {
    this.current().push({ op: 'rect', rect: { ...rect }, paint });
  }

  layout(): LayoutInfo {
    return { pages: this.pages };
  }

  async finish(): Promise<Uint8Array> {
    return new TextEncoder().encode(JSON.stringify(this.layout()));
  }

  private current(): DrawOp[] {
    const page = this.pages[this.pages.length - 1];
    if (!page) throw new RenderBackendError('Drawing before the first page was started');
    return page.ops;
  }
}
