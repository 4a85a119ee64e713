import { describe, it, expect } from 'vitest';
import {
  buildDocument,
  ConfigurationError,
  FrameCellDecorator,
  LayoutError,
  parseDocument,
  RecordingBackend,
  renderJson,
  TableLayout,
  buildElement,
} from '../src/index.js';
import { FixedFontBackend, texts } from './helpers.js';

describe('parseDocument', () => {
  it('rejects malformed JSON text', () => {
    expect(() => parseDocument('not valid json {{')).toThrow(ConfigurationError);
    expect(() => parseDocument('not valid json {{')).toThrow(/^Failed to parse document: /);
  });

  it('names the path of every invalid field', () => {
    expect(() => parseDocument({ children: [{ type: 'Bogus' }] })).toThrow(
      /^Invalid document: children\.0\.type: /,
    );
    expect(() => parseDocument({ fontSize: -1, children: [] })).toThrow(/^Invalid document: fontSize: /);
  });

  it('accepts a nested document', () => {
    const def = parseDocument(
      JSON.stringify({
        paperSize: 'A5',
        children: [
          {
            type: 'Styled',
            style: { bold: true },
            child: { type: 'Paragraph', runs: [{ text: 'Hi' }], alignment: 'center' },
          },
        ],
      }),
    );
    expect(def.paperSize).toBe('A5');
    expect(def.children[0]).toMatchObject({ type: 'Styled', child: { type: 'Paragraph' } });
  });
});

describe('buildElement', () => {
  it('builds tables with their decorator', () => {
    const table = buildElement({
      type: 'Table',
      columnWeights: [1, 2],
      cellDecorator: { inner: true, outer: true, continuation: false, lineStyle: { thickness: 0.5 } },
      rows: [{ cells: [{ type: 'Text', text: 'a' }, { type: 'Text', text: 'b' }] }],
    });
    expect(table).toBeInstanceOf(TableLayout);
    if (!(table instanceof TableLayout)) return;
    expect(table.rows).toHaveLength(1);
    expect(table.cellDecorator).toBeInstanceOf(FrameCellDecorator);
    expect(table.cellDecorator).toMatchObject({ lineStyle: { thickness: 0.5, color: { r: 0, g: 0, b: 0 } } });
  });

  it('throws the row error for a row of the wrong shape', () => {
    const build = () =>
      buildElement({ type: 'Table', columnWeights: [1, 1], rows: [{ cells: [{ type: 'Text', text: 'a' }] }] });
    expect(build).toThrow(LayoutError);
    expect(build).toThrow('Row has 1 cell(s) but the table has 2 column(s)');
  });
});

describe('renderJson', () => {
  it('numbers headers and skips the first page by default', async () => {
    const backend = new RecordingBackend();
    await renderJson(
      {
        paperSize: { width: 100, height: 30 },
        margins: 5,
        fontSize: 10,
        header: { element: { type: 'Text', text: 'Page {{pageNumber}}' } },
        children: [
          { type: 'Text', text: 'first' },
          { type: 'PageBreak' },
          { type: 'Text', text: 'second' },
        ],
      },
      { fonts: new FixedFontBackend(), backend },
    );

    expect(backend.pages.map(page => texts(page.ops))).toEqual([['first'], ['Page 2', 'second']]);
  });

  it('draws the header on the first page when asked', () => {
    const def = parseDocument({
      header: { element: { type: 'Text', text: 'Page {{pageNumber}}' }, firstPage: true },
      children: [],
    });
    const backend = new RecordingBackend();
    buildDocument(def, new FixedFontBackend()).paginate(backend);
    expect(texts(backend.pages[0].ops)).toEqual(['Page 1']);
  });
});
