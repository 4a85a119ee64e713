import PDFDocument from 'pdfkit';
import { ConfigurationError } from './errors.js';
import type { ResolvedStyle } from './style.js';
import { ptToMm } from './units.js';

/** A font family: one face name per emphasis combination. */
export interface FontFamily {
  name: string;
  regular: string;
  bold: string;
  italic: string;
  boldItalic: string;
}

/**
 * Glyph metrics for styled text. Implementations are queried read-only and
 * may be shared between documents.
 */
export interface FontBackend {
  /** Family used when a requested family cannot be resolved. */
  readonly fallbackFamily?: string;
  resolveFamily(name: string): FontFamily | undefined;
  /** Advance width of each character of `text`, in millimetres, without kerning. */
  measure(style: ResolvedStyle, text: string): number[];
  /** Kerning adjustment between two adjacent characters, in millimetres. */
  kerning(style: ResolvedStyle, left: string, right: string): number;
  /** Height of one line of text, in millimetres. */
  lineHeight(style: ResolvedStyle): number;
}

export function faceName(family: FontFamily, style: Pick<ResolvedStyle, 'bold' | 'italic'>): string {
  if (style.bold && style.italic) return family.boldItalic;
  if (style.bold) return family.bold;
  if (style.italic) return family.italic;
  return family.regular;
}

/**
 * Resolves `name`, falling back to the backend's built-in family.
 * Throws when neither is available.
 */
export function resolveFamily(fonts: FontBackend, name: string): FontFamily {
  const family = fonts.resolveFamily(name)
    ?? (fonts.fallbackFamily !== undefined ? fonts.resolveFamily(fonts.fallbackFamily) : undefined);
  if (!family) {
    throw new ConfigurationError(`No usable font family for "${name}"`);
  }
  return family;
}

// ── Standard PDF fonts ─────────────────────────────────────────────

export const STANDARD_FAMILIES: Record<string, FontFamily> = {
  Helvetica: {
    name: 'Helvetica',
    regular: 'Helvetica',
    bold: 'Helvetica-Bold',
    italic: 'Helvetica-Oblique',
    boldItalic: 'Helvetica-BoldOblique',
  },
  Times: {
    name: 'Times',
    regular: 'Times-Roman',
    bold: 'Times-Bold',
    italic: 'Times-Italic',
    boldItalic: 'Times-BoldItalic',
  },
  Courier: {
    name: 'Courier',
    regular: 'Courier',
    bold: 'Courier-Bold',
    italic: 'Courier-Oblique',
    boldItalic: 'Courier-BoldOblique',
  },
};

export function standardFamily(name: string): FontFamily | undefined {
  return Object.hasOwn(STANDARD_FAMILIES, name) ? STANDARD_FAMILIES[name] : undefined;
}

/**
 * Metrics of the standard PDF fonts, read from the AFM files bundled with
 * pdfkit. Needs nothing from the filesystem beyond the pdfkit package.
 */
export class StandardFontBackend implements FontBackend {
  readonly fallbackFamily = 'Helvetica';

  private readonly metrics: PDFKit.PDFDocument = new PDFDocument({ autoFirstPage: false });
  // Widths at 1pt, keyed by face and string.
  private readonly widths = new Map<string, number>();

  resolveFamily(name: string): FontFamily | undefined {
    return standardFamily(name);
  }

  measure(style: ResolvedStyle, text: string): number[] {
    return Array.from(text, ch => this.width(style, ch));
  }

  kerning(style: ResolvedStyle, left: string, right: string): number {
    return this.width(style, left + right) - this.width(style, left) - this.width(style, right);
  }

  lineHeight(style: ResolvedStyle): number {
    this.metrics.font(this.face(style)).fontSize(style.fontSize);
    return ptToMm(this.metrics.currentLineHeight(true));
  }

  private face(style: ResolvedStyle): string {
    return faceName(resolveFamily(this, style.fontFamily), style);
  }

  private width(style: ResolvedStyle, text: string): number {
    const face = this.face(style);
    const key = `${face}\u0000${text}`;
    let unit = this.widths.get(key);
    if (unit === undefined) {
      unit = this.metrics.font(face).fontSize(1).widthOfString(text);
      this.widths.set(key, unit);
    }
    return ptToMm(unit * style.fontSize);
  }
}
