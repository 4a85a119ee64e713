import type { ReactNode } from 'react';
import type { Alignment, Edges, PaperSize } from '@pagewright/core';

export type { Edges };

// ─── Developer-facing types ──────────────────────────────────────────

/**
 * CSS-like style properties. Lengths are millimetres, font sizes points.
 * Colours are hex strings (`#rgb` or `#rrggbb`).
 */
export interface Style {
  // Box model
  padding?: number | Edges;
  paddingTop?: number;
  paddingRight?: number;
  paddingBottom?: number;
  paddingLeft?: number;
  paddingHorizontal?: number;
  paddingVertical?: number;

  // Typography
  fontSize?: number;
  fontFamily?: string;
  fontWeight?: number | 'normal' | 'bold';
  fontStyle?: 'normal' | 'italic' | 'oblique';
  textAlign?: Alignment;
  color?: string;

  // Visual
  borderWidth?: number;
  borderColor?: string;
}

// ─── Component prop types ────────────────────────────────────────────

export interface DocumentProps {
  title?: string;
  paperSize?: PaperSize;
  margin?: number | Edges;
  fontFamily?: string;
  fontSize?: number;
  lineSpacing?: number;
  children?: ReactNode;
}

export interface HeaderProps {
  /** Also draw the header on the first page (default: false). */
  firstPage?: boolean;
  children?: ReactNode;
}

export interface ViewProps {
  style?: Style;
  children?: ReactNode;
}

export interface TextProps {
  style?: Style;
  children?: ReactNode;
}

export interface LineProps {
  style?: Style;
  children?: ReactNode;
}

export interface TableBorders {
  /** Borders between cells. */
  inner?: boolean;
  /** The border around the table. */
  outer?: boolean;
  /** Borders where the table breaks across pages. */
  continuation?: boolean;
  width?: number;
  color?: string;
}

export interface TableProps {
  /** Relative column widths. */
  columns: number[];
  /** `true` draws every border. */
  borders?: boolean | TableBorders;
  children?: ReactNode;
}

/** Rows take a fill and nothing else. */
export interface RowStyle {
  backgroundColor?: string;
}

export interface RowProps {
  style?: RowStyle;
  children?: ReactNode;
}

export interface CellProps {
  style?: Style;
  children?: ReactNode;
}

export interface BreakProps {
  /** Number of blank lines (default: 1). */
  lines?: number;
}
