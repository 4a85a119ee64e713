import { describe, it, expect } from 'vitest';
import {
  Document,
  Paragraph,
  PdfRenderBackend,
  RenderBackendError,
  renderJson,
  StandardFontBackend,
  text,
  type ResolvedStyle,
} from '../src/index.js';

const helvetica: ResolvedStyle = {
  fontFamily: 'Helvetica',
  fontSize: 12,
  color: { r: 0, g: 0, b: 0 },
  bold: false,
  italic: false,
};

function pageCount(bytes: Uint8Array): number {
  const content = new TextDecoder().decode(bytes);
  return (content.match(/\/Type\s*\/Page[^s]/g) || []).length;
}

describe('StandardFontBackend', () => {
  const fonts = new StandardFontBackend();

  it('resolves the standard families only', () => {
    expect(fonts.resolveFamily('Times')?.bold).toBe('Times-Bold');
    expect(fonts.resolveFamily('Comic')).toBeUndefined();
    expect(fonts.fallbackFamily).toBe('Helvetica');
  });

  it('reads kerning pairs from the font metrics', () => {
    expect(fonts.kerning(helvetica, 'A', 'V')).toBeLessThan(0);
    expect(fonts.kerning(helvetica, 'x', 'x')).toBeCloseTo(0, 9);
  });

  it('measures per character and scales with the font size', () => {
    const [w] = fonts.measure(helvetica, 'W');
    const [big] = fonts.measure({ ...helvetica, fontSize: 24 }, 'W');
    expect(w).toBeGreaterThan(0);
    expect(big).toBeCloseTo(2 * w, 9);
    expect(fonts.measure(helvetica, 'abc')).toHaveLength(3);
    expect(fonts.lineHeight(helvetica)).toBeGreaterThan(0);
  });
});

describe('PdfRenderBackend', () => {
  it('renders a document to PDF bytes', async () => {
    const doc = new Document({ fonts: new StandardFontBackend() }).push(new Paragraph('Hello, world'));
    const bytes = await doc.render();
    expect(new TextDecoder().decode(bytes.slice(0, 5))).toBe('%PDF-');
    expect(pageCount(bytes)).toBe(1);
  });

  it('writes one PDF page per document page', async () => {
    const bytes = await renderJson({
      title: 'Invoice',
      children: [{ type: 'Text', text: 'one' }, { type: 'PageBreak' }, { type: 'Text', text: 'two' }],
    });
    expect(pageCount(bytes)).toBe(2);
    expect(new TextDecoder().decode(bytes)).toContain('/Title (Invoice)');
  });

  it('rejects fonts it cannot draw', async () => {
    const backend = new PdfRenderBackend();
    backend.beginPage({ width: 100, height: 100 });
    expect(() => backend.drawText({ x: 0, y: 0 }, 'x', { ...helvetica, fontFamily: 'Test' })).toThrow(
      RenderBackendError,
    );
  });

  it('refuses to draw before a page exists', () => {
    const backend = new PdfRenderBackend();
    expect(() => backend.drawText({ x: 0, y: 0 }, 'x', helvetica)).toThrow(RenderBackendError);
  });
});

describe('Document with standard fonts', () => {
  it('draws single-line text unwrapped', async () => {
    const doc = new Document({ fonts: new StandardFontBackend(), fontFamily: 'Courier' }).push(text('mono'));
    const bytes = await doc.render(new PdfRenderBackend({ compress: false }));
    expect(new TextDecoder().decode(bytes)).toContain('/BaseFont /Courier');
  });
});
