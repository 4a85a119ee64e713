import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  Document,
  LayoutError,
  LinearLayout,
  lineBreak,
  pageBreak,
  RecordingBackend,
  SimplePageDecorator,
  styled,
  text,
  type LayoutInfo,
  type RenderState,
} from '../src/index.js';
import { FixedFontBackend, layout, smallDocument, texts } from './helpers.js';

describe('Document', () => {
  it('paginates until all content is placed', () => {
    const backend = layout(Array.from({ length: 20 }, (_, i) => text(`line ${i}`)));
    expect(backend.pages).toHaveLength(5);
    expect(texts(backend.pages[4].ops)).toEqual(['line 16', 'line 17', 'line 18', 'line 19']);
    expect(backend.pages[4].ops[3]).toMatchObject({ position: { x: 5, y: 20 } });
  });

  it('always produces at least one page', () => {
    const backend = layout([]);
    expect(backend.pages).toEqual([{ width: 100, height: 30, ops: [] }]);
  });

  it('starts a new page after a page break', () => {
    const backend = layout([text('one'), pageBreak(), text('two')]);
    expect(backend.pages.map(page => texts(page.ops))).toEqual([['one'], ['two']]);
  });

  it('asks the decorator for a header on every page', () => {
    const requested: number[] = [];
    const decorator = new SimplePageDecorator().setMargins(5).setHeader(page => {
      requested.push(page);
      return page === 1 ? undefined : text(`Page ${page}`);
    });
    const backend = layout([text('one'), pageBreak(), text('two')], smallDocument(decorator));

    expect(requested).toEqual([1, 2]);
    expect(backend.pages[0].ops).toHaveLength(1);
    expect(backend.pages[1].ops).toMatchObject([
      { text: 'Page 2', position: { x: 5, y: 5 } },
      { text: 'two', position: { x: 5, y: 10 } },
    ]);
  });

  it('reports every state transition', () => {
    const states: string[] = [];
    const doc = smallDocument().push(text('one')).push(pageBreak()).push(text('two'));
    doc.paginate(new RecordingBackend(), {
      onStateChange: (state: RenderState) => states.push(`${state.state}(${state.page})`),
    });

    expect(states).toEqual([
      'AwaitingPage(1)',
      'HeaderDrawn(1)',
      'ContentRendering(1)',
      'PageComplete(1)',
      'AwaitingPage(2)',
      'HeaderDrawn(2)',
      'ContentRendering(2)',
      'PageComplete(2)',
    ]);
  });

  it('rejects margins that leave no content area before any page', () => {
    const backend = new RecordingBackend();
    const doc = smallDocument(new SimplePageDecorator().setMargins({ top: 15, right: 5, bottom: 15, left: 5 }));
    doc.push(text('x'));

    expect(() => doc.paginate(backend)).toThrow(ConfigurationError);
    expect(() => doc.paginate(backend)).toThrow('Margins leave no content area on page 1 (90mm x 0mm)');
    expect(backend.pages).toEqual([]);
  });

  it('rejects a font family it cannot resolve', async () => {
    const doc = new Document({ fonts: new FixedFontBackend({ fallback: false }), fontFamily: 'Missing' });
    await expect(doc.render(new RecordingBackend())).rejects.toThrow('No usable font family for "Missing"');
  });

  it('falls back to the backend family', () => {
    const doc = new Document({ fonts: new FixedFontBackend(), fontFamily: 'Missing', fontSize: 10 });
    const backend = layout([text('x')], doc);
    expect(backend.pages[0].ops[0]).toMatchObject({ style: { fontFamily: 'Test' } });
  });

  it('fails instead of looping when an element never fits', () => {
    const doc = smallDocument().push(text('a')).push(text('huge', { fontSize: 100 }));
    expect(() => doc.paginate(new RecordingBackend())).toThrow(LayoutError);
  });

  it('fails when the header does not fit', () => {
    const decorator = new SimplePageDecorator().setMargins(5).setHeader(() => text('huge', { fontSize: 100 }));
    expect(() => layout([text('a')], smallDocument(decorator))).toThrow(
      'The header of page 1 does not fit in the content area',
    );
  });

  it('serializes the recorded layout from render()', async () => {
    const doc = smallDocument().push(text('hello'));
    const bytes = await doc.render(new RecordingBackend());
    const info: LayoutInfo = JSON.parse(new TextDecoder().decode(bytes));
    expect(info.pages).toHaveLength(1);
    expect(info.pages[0].ops[0]).toMatchObject({ op: 'text', text: 'hello' });
  });
});

describe('elements', () => {
  it('spaces by whole lines with a break', () => {
    const ops = layout([text('a'), lineBreak(2), text('b')]).pages[0].ops;
    expect(ops[1]).toMatchObject({ text: 'b', position: { x: 5, y: 20 } });
  });

  it('ends the page with a break that does not fit', () => {
    const backend = layout([text('a'), text('b'), text('c'), lineBreak(3), text('d')]);
    expect(backend.pages.map(page => texts(page.ops))).toEqual([['a', 'b', 'c'], ['d']]);
  });

  it('passes a style down to every descendant', () => {
    const column = LinearLayout.vertical([text('a'), text('b', { italic: true })]);
    const ops = layout([styled(column, { bold: true, fontFamily: 'Other' })]).pages[0].ops;
    expect(ops).toMatchObject([
      { text: 'a', style: { fontFamily: 'Other', bold: true, italic: false } },
      { text: 'b', style: { fontFamily: 'Other', bold: true, italic: true } },
    ]);
  });
});
