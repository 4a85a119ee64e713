import PDFDocument from 'pdfkit';
import type { Paint, RenderBackend } from './backend.js';
import { RenderBackendError } from './errors.js';
import { faceName, standardFamily } from './fonts.js';
import type { Color, LineStyle, ResolvedStyle } from './style.js';
import { mmToPt, type Point, type Rect, type Size } from './units.js';

export interface PdfBackendOptions {
  title?: string;
  author?: string;
  /** Deflate page content streams (default: true). */
  compress?: boolean;
}

/** Fixed so that identical documents serialize to identical bytes. */
const CREATION_DATE = new Date(0);

function toHex(color: Color): string {
  return '#' + [color.r, color.g, color.b].map(c => c.toString(16).padStart(2, '0')).join('');
}

/**
 * Writes pages through pdfkit using the standard PDF fonts, so that text
 * measured by StandardFontBackend lands exactly where it was laid out.
 */
export class PdfRenderBackend implements RenderBackend {
  private readonly doc: PDFKit.PDFDocument;
  private pageCount = 0;

  constructor(options: PdfBackendOptions = {}) {
    const info: { Title?: string; Author?: string; CreationDate: Date; ModDate: Date } = {
      CreationDate: CREATION_DATE,
      ModDate: CREATION_DATE,
    };
    if (options.title !== undefined) info.Title = options.title;
    if (options.author !== undefined) info.Author = options.author;
    this.doc = new PDFDocument({ autoFirstPage: false, compress: options.compress ?? true, info });
  }

  beginPage(size: Size): void {
    this.doc.addPage({ size: [mmToPt(size.width), mmToPt(size.height)], margin: 0 });
    this.pageCount++;
  }

  drawText(position: Point, text: string, style: ResolvedStyle): void {
    this.ensurePage();
    const family = standardFamily(style.fontFamily);
    if (!family) {
      throw new RenderBackendError(`Font family "${style.fontFamily}" is not a standard PDF font`);
    }
    this.doc
      .font(faceName(family, style))
      .fontSize(style.fontSize)
      .fillColor(toHex(style.color))
      .text(text, mmToPt(position.x), mmToPt(position.y), { lineBreak: false });
  }

  drawLine(start: Point, end: Point, lineStyle: LineStyle): void {
    this.ensurePage();
    this.doc
      .save()
      .moveTo(mmToPt(start.x), mmToPt(start.y))
      .lineTo(mmToPt(end.x), mmToPt(end.y))
      .lineWidth(mmToPt(lineStyle.thickness))
      .strokeColor(toHex(lineStyle.color))
      .stroke()
      .restore();
  }

  drawRect(rect: Rect, paint: Paint): void {
    this.ensurePage();
    this.doc.save().rect(mmToPt(rect.x), mmToPt(rect.y), mmToPt(rect.width), mmToPt(rect.height));
    if ('fill' in paint) {
      this.doc.fill(toHex(paint.fill));
    } else {
      this.doc.lineWidth(mmToPt(paint.stroke.thickness)).strokeColor(toHex(paint.stroke.color)).stroke();
    }
    this.doc.restore();
  }

  finish(): Promise<Uint8Array> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      this.doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      this.doc.on('end', () => resolve(new Uint8Array(Buffer.concat(chunks))));
      this.doc.on('error', (err: unknown) => {
        reject(new RenderBackendError('Failed to serialize PDF', { cause: err }));
      });
      try {
        this.doc.end();
      } catch (err) {
        reject(new RenderBackendError('Failed to serialize PDF', { cause: err }));
      }
    });
  }

  private ensurePage(): void {
    if (this.pageCount === 0) {
      throw new RenderBackendError('Drawing before the first page was started');
    }
  }
}
