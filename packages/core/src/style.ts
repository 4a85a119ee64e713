import { LayoutError } from './errors.js';

/** An RGB colour with integer channels in 0–255. */
export interface Color {
  r: number;
  g: number;
  b: number;
}

/**
 * Local style overrides. Unset fields inherit from the enclosing style when
 * the element is rendered.
 */
export interface Style {
  fontFamily?: string;
  /** Font size in points. */
  fontSize?: number;
  color?: Color;
  bold?: boolean;
  italic?: boolean;
}

/** A style with every field decided, as seen by measurement and drawing. */
export interface ResolvedStyle {
  readonly fontFamily: string;
  readonly fontSize: number;
  readonly color: Color;
  readonly bold: boolean;
  readonly italic: boolean;
}

export interface LineStyle {
  /** Stroke width in millimetres. */
  thickness: number;
  color: Color;
}

export const BLACK: Color = { r: 0, g: 0, b: 0 };

export const DEFAULT_LINE_STYLE: LineStyle = { thickness: 0.1, color: BLACK };

export function rgb(r: number, g: number, b: number): Color {
  for (const channel of [r, g, b]) {
    if (!Number.isInteger(channel) || channel < 0 || channel > 255) {
      throw new LayoutError(`Invalid colour channel ${channel}: expected an integer in 0-255`);
    }
  }
  return { r, g, b };
}

export function lineStyle(overrides: Partial<LineStyle> = {}): LineStyle {
  return {
    thickness: overrides.thickness ?? DEFAULT_LINE_STYLE.thickness,
    color: overrides.color ?? DEFAULT_LINE_STYLE.color,
  };
}

export function resolveStyle(ancestor: ResolvedStyle, local?: Style): ResolvedStyle {
  if (!local) return ancestor;
  return {
    fontFamily: local.fontFamily ?? ancestor.fontFamily,
    fontSize: local.fontSize ?? ancestor.fontSize,
    color: local.color ?? ancestor.color,
    bold: local.bold ?? ancestor.bold,
    italic: local.italic ?? ancestor.italic,
  };
}

/** Combines two override sets; fields set on `inner` win. */
export function mergeStyles(outer: Style, inner: Style): Style {
  const result: Style = { ...outer };
  if (inner.fontFamily !== undefined) result.fontFamily = inner.fontFamily;
  if (inner.fontSize !== undefined) result.fontSize = inner.fontSize;
  if (inner.color !== undefined) result.color = inner.color;
  if (inner.bold !== undefined) result.bold = inner.bold;
  if (inner.italic !== undefined) result.italic = inner.italic;
  return result;
}

/** Two resolved styles with the same key draw identical glyphs. */
export function styleKey(style: ResolvedStyle): string {
  const { r, g, b } = style.color;
  return `${style.fontFamily}|${style.fontSize}|${style.bold ? 'b' : ''}${style.italic ? 'i' : ''}|${r},${g},${b}`;
}
