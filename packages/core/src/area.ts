import type { Canvas, Paint } from './backend.js';
import type { LineStyle, ResolvedStyle } from './style.js';
import type { Edges, Point, Rect } from './units.js';

/** Slack for floating-point drift when comparing heights. */
export const EPSILON = 1e-6;

const NULL_CANVAS: Canvas = {
  drawText: () => undefined,
  drawLine: () => undefined,
  drawRect: () => undefined,
};

/**
 * A rectangular region of the current page with a cursor tracking how much
 * of its height has been consumed. Drawing coordinates are relative to the
 * area's origin.
 */
export class Area {
  readonly origin: Point;
  readonly width: number;
  readonly height: number;
  private consumed = 0;

  constructor(readonly canvas: Canvas, origin: Point, width: number, height: number) {
    this.origin = { x: origin.x, y: origin.y };
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
  }

  get cursor(): number {
    return this.consumed;
  }

  get remainingHeight(): number {
    return this.height - this.consumed;
  }

  /** Whether a block of `height` fits below the cursor. */
  fits(height: number): boolean {
    return height <= this.remainingHeight + EPSILON;
  }

  /** Moves the cursor down; it never passes the bottom edge. */
  advance(dy: number): void {
    this.consumed = Math.min(this.height, this.consumed + Math.max(0, dy));
  }

  /** The unconsumed part of this area, as a fresh area. */
  rest(): Area {
    return new Area(
      this.canvas,
      { x: this.origin.x, y: this.origin.y + this.consumed },
      this.width,
      this.remainingHeight,
    );
  }

  /** The unconsumed part, shrunk by `edges` on each side. */
  inset(edges: Edges): Area {
    return new Area(
      this.canvas,
      { x: this.origin.x + edges.left, y: this.origin.y + this.consumed + edges.top },
      this.width - edges.left - edges.right,
      this.remainingHeight - edges.top - edges.bottom,
    );
  }

  /** A vertical slice of the unconsumed part. */
  column(offset: number, width: number): Area {
    return new Area(
      this.canvas,
      { x: this.origin.x + offset, y: this.origin.y + this.consumed },
      width,
      this.remainingHeight,
    );
  }

  /** A region at `rect`, relative to this area's origin. */
  region(rect: Rect): Area {
    return new Area(this.canvas, this.absolute(rect), rect.width, rect.height);
  }

  /** The same geometry with drawing discarded, for measuring. */
  dryRun(): Area {
    const area = new Area(NULL_CANVAS, this.origin, this.width, this.height);
    area.consumed = this.consumed;
    return area;
  }

  drawText(position: Point, text: string, style: ResolvedStyle): void {
    this.canvas.drawText(this.absolute(position), text, style);
  }

  drawLine(start: Point, end: Point, lineStyle: LineStyle): void {
    this.canvas.drawLine(this.absolute(start), this.absolute(end), lineStyle);
  }

  drawRect(rect: Rect, paint: Paint): void {
    const { x, y } = this.absolute(rect);
    this.canvas.drawRect({ x, y, width: rect.width, height: rect.height }, paint);
  }

  private absolute(point: Point): Point {
    return { x: this.origin.x + point.x, y: this.origin.y + point.y };
  }
}
