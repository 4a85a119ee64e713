import { Area } from './area.js';
import type { RenderBackend } from './backend.js';
import type { RenderContext } from './context.js';
import { SimplePageDecorator, type PageDecorator } from './decorators.js';
import { LinearLayout, type Element } from './elements.js';
import { ConfigurationError, LayoutError } from './errors.js';
import { resolveFamily, type FontBackend } from './fonts.js';
import { PdfRenderBackend } from './pdf-backend.js';
import { renderElement } from './render.js';
import { BLACK } from './style.js';
import { resolvePaperSize, type PaperSize, type Rect, type Size } from './units.js';

export type RenderStateName = 'AwaitingPage' | 'HeaderDrawn' | 'ContentRendering' | 'PageComplete';

export interface RenderState {
  state: RenderStateName;
  page: number;
}

export interface RenderOptions {
  /** Called on every pagination state transition. */
  onStateChange?: (state: RenderState) => void;
}

export interface DocumentOptions {
  fonts: FontBackend;
  /** Default family name; resolved through `fonts` when rendering. */
  fontFamily?: string;
  /** Default font size in points. */
  fontSize?: number;
  lineSpacing?: number;
  paperSize?: PaperSize;
  decorator?: PageDecorator;
  title?: string;
}

const DEFAULT_FONT_SIZE = 12;

/**
 * The root of a document: an ordered list of elements plus the page setup
 * they are paginated with.
 *
 * @example
 * ```ts
 * const doc = new Document({ fonts: new StandardFontBackend() });
 * doc.setPageDecorator(new SimplePageDecorator().setMargins(10));
 * doc.push(new Paragraph('Hello'));
 * const pdf = await doc.render();
 * ```
 */
export class Document {
  private readonly root = LinearLayout.vertical();
  private readonly fonts: FontBackend;
  private fontFamily: string;
  private fontSize: number;
  private lineSpacing: number;
  private paperSize: PaperSize;
  private decorator: PageDecorator;
  private title?: string;

  constructor(options: DocumentOptions) {
    this.fonts = options.fonts;
    this.fontFamily = options.fontFamily ?? options.fonts.fallbackFamily ?? '';
    this.fontSize = options.fontSize ?? DEFAULT_FONT_SIZE;
    this.lineSpacing = options.lineSpacing ?? 1;
    this.paperSize = options.paperSize ?? 'A4';
    this.decorator = options.decorator ?? new SimplePageDecorator();
    this.title = options.title;
  }

  push(element: Element): this {
    this.root.push(element);
    return this;
  }

  setPaperSize(paperSize: PaperSize): this {
    this.paperSize = paperSize;
    return this;
  }

  setPageDecorator(decorator: PageDecorator): this {
    this.decorator = decorator;
    return this;
  }

  setFontFamily(fontFamily: string): this {
    this.fontFamily = fontFamily;
    return this;
  }

  setFontSize(fontSize: number): this {
    this.fontSize = fontSize;
    return this;
  }

  setLineSpacing(lineSpacing: number): this {
    this.lineSpacing = lineSpacing;
    return this;
  }

  setTitle(title: string): this {
    this.title = title;
    return this;
  }

  /**
   * Paginates the document into `backend` and returns the serialized
   * output. Defaults to a PDF backend.
   */
  async render(backend?: RenderBackend, options: RenderOptions = {}): Promise<Uint8Array> {
    const target = backend ?? new PdfRenderBackend({ title: this.title });
    this.paginate(target, options);
    return target.finish();
  }

  /** Draws every page into `backend` and returns the number of pages. */
  paginate(backend: RenderBackend, options: RenderOptions = {}): number {
    const ctx = this.context();
    const pageSize = resolvePaperSize(this.paperSize);
    this.contentArea(1, pageSize);

    const emit = (state: RenderStateName, page: number) => options.onStateChange?.({ state, page });
    let pending: Element = this.root;

    for (let page = 1; ; page++) {
      emit('AwaitingPage', page);
      const rect = this.contentArea(page, pageSize);
      backend.beginPage(pageSize);
      const area = new Area(backend, { x: rect.x, y: rect.y }, rect.width, rect.height);

      const header = this.decorator.header?.(page);
      if (header) {
        const outcome = renderElement(header, area, ctx);
        if (outcome.status === 'continued') {
          throw new LayoutError(`The header of page ${page} does not fit in the content area`);
        }
        area.advance(outcome.size.height);
      }
      emit('HeaderDrawn', page);

      emit('ContentRendering', page);
      const outcome = renderElement(pending, area, ctx);
      emit('PageComplete', page);

      if (outcome.status === 'complete') return page;
      if (outcome.continuation === pending) {
        throw new LayoutError(`Nothing could be placed on page ${page}: an element is larger than an empty page`);
      }
      pending = outcome.continuation;
    }
  }

  private context(): RenderContext {
    if (!(this.fontSize > 0)) {
      throw new ConfigurationError(`Font size must be positive, got ${this.fontSize}`);
    }
    if (!(this.lineSpacing > 0)) {
      throw new ConfigurationError(`Line spacing must be positive, got ${this.lineSpacing}`);
    }
    const family = resolveFamily(this.fonts, this.fontFamily);
    return {
      fonts: this.fonts,
      lineSpacing: this.lineSpacing,
      style: { fontFamily: family.name, fontSize: this.fontSize, color: BLACK, bold: false, italic: false },
    };
  }

  private contentArea(page: number, pageSize: Size): Rect {
    const rect = this.decorator.contentArea(page, pageSize);
    if (!(rect.width > 0) || !(rect.height > 0)) {
      throw new ConfigurationError(
        `Margins leave no content area on page ${page} (${rect.width}mm x ${rect.height}mm)`,
      );
    }
    return rect;
  }
}
