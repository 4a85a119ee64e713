import {
  Document,
  RecordingBackend,
  SimplePageDecorator,
  type DrawOp,
  type Element,
  type FontBackend,
  type FontFamily,
  type ResolvedStyle,
} from '../src/index.js';

const FAMILIES: Record<string, FontFamily> = {
  Test: { name: 'Test', regular: 'Test', bold: 'Test-Bold', italic: 'Test-Italic', boldItalic: 'Test-BoldItalic' },
  Other: { name: 'Other', regular: 'Other', bold: 'Other', italic: 'Other', boldItalic: 'Other' },
};

/**
 * Metrics chosen to be easy to trace: every glyph advances fontSize / 10 mm,
 * a line is fontSize / 2 mm high and the pair "AV" kerns by -fontSize / 100.
 */
export class FixedFontBackend implements FontBackend {
  readonly fallbackFamily?: string;

  constructor(options: { fallback?: boolean } = {}) {
    if (options.fallback !== false) this.fallbackFamily = 'Test';
  }

  resolveFamily(name: string): FontFamily | undefined {
    return Object.hasOwn(FAMILIES, name) ? FAMILIES[name] : undefined;
  }

  measure(style: ResolvedStyle, text: string): number[] {
    return Array.from(text, () => style.fontSize / 10);
  }

  kerning(style: ResolvedStyle, left: string, right: string): number {
    return left === 'A' && right === 'V' ? -style.fontSize / 100 : 0;
  }

  lineHeight(style: ResolvedStyle): number {
    return style.fontSize / 2;
  }
}

/** 100 x 30 mm pages with 5 mm margins, 10pt text: 90 x 20 mm of content, 5 mm lines. */
export function smallDocument(decorator = new SimplePageDecorator().setMargins(5)): Document {
  return new Document({
    fonts: new FixedFontBackend(),
    fontSize: 10,
    paperSize: { width: 100, height: 30 },
    decorator,
  });
}

export function layout(elements: Element[], doc = smallDocument()): RecordingBackend {
  const backend = new RecordingBackend();
  for (const element of elements) doc.push(element);
  doc.paginate(backend);
  return backend;
}

export function texts(ops: DrawOp[]): string[] {
  return ops.flatMap(op => (op.op === 'text' ? [op.text] : []));
}

export function lines(ops: DrawOp[]): Extract<DrawOp, { op: 'line' }>[] {
  return ops.flatMap(op => (op.op === 'line' ? [op] : []));
}
