// ── Geometry ───────────────────────────────────────────────────────
// All lengths are millimetres unless a name says otherwise. Font sizes are
// points.

export const MM_PER_PT = 25.4 / 72;

export function ptToMm(pt: number): number {
  return pt * MM_PER_PT;
}

export function mmToPt(mm: number): number {
  return mm / MM_PER_PT;
}

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Edges {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export const NO_EDGES: Edges = { top: 0, right: 0, bottom: 0, left: 0 };

export function expandEdges(val: number | Edges): Edges {
  if (typeof val === 'number') {
    return { top: val, right: val, bottom: val, left: val };
  }
  return { top: val.top, right: val.right, bottom: val.bottom, left: val.left };
}

// ── Paper sizes ────────────────────────────────────────────────────

export type PaperSizeName = 'A3' | 'A4' | 'A5' | 'Letter' | 'Legal';

export type PaperSize = PaperSizeName | Size;

export const PAPER_SIZES: Record<PaperSizeName, Size> = {
  A3: { width: 297, height: 420 },
  A4: { width: 210, height: 297 },
  A5: { width: 148, height: 210 },
  Letter: { width: 215.9, height: 279.4 },
  Legal: { width: 215.9, height: 355.6 },
};

export function resolvePaperSize(size: PaperSize): Size {
  if (typeof size === 'string') return { ...PAPER_SIZES[size] };
  return { width: size.width, height: size.height };
}
