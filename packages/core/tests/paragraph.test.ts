import { describe, it, expect } from 'vitest';
import { LayoutError, Paragraph, text } from '../src/index.js';
import { layout, smallDocument, texts } from './helpers.js';

/** `count` nine-letter words: nine of them fill a 90 mm line. */
function words(count: number): string {
  return Array.from({ length: count }, () => 'abcdefghi').join(' ');
}

describe('Paragraph', () => {
  it('lays out a kerned pair identically whether given as one run or two', () => {
    const joined = layout([new Paragraph('AV').aligned('right')]);
    const split = layout([new Paragraph('A').string('V').aligned('right')]);

    expect(split.pages).toEqual(joined.pages);
    const [op] = joined.pages[0].ops;
    expect(op.op).toBe('text');
    if (op.op !== 'text') return;
    expect(op.text).toBe('AV');
    // 90 mm line, "AV" is 1 + 1 - 0.1 mm wide
    expect(op.position.x).toBeCloseTo(93.1, 9);
    expect(op.position.y).toBe(5);
  });

  it('does not kern across a style change', () => {
    const backend = layout([new Paragraph('A').string('V', { bold: true })]);
    const ops = backend.pages[0].ops;
    expect(texts(ops)).toEqual(['A', 'V']);
    expect(ops[1]).toMatchObject({ position: { x: 6, y: 5 }, style: { bold: true } });
  });

  it('keeps text that fits the line on a single line', () => {
    const backend = layout([new Paragraph(words(9))]);
    expect(texts(backend.pages[0].ops)).toEqual([words(9)]);
  });

  it('wraps at whitespace and drops the space at the break', () => {
    const backend = layout([new Paragraph(words(10))]);
    const ops = backend.pages[0].ops;
    expect(texts(ops)).toEqual([words(9), 'abcdefghi']);
    expect(ops[1]).toMatchObject({ position: { x: 5, y: 10 } });
  });

  it('centres lines', () => {
    const backend = layout([new Paragraph('abcd').aligned('center')]);
    expect(backend.pages[0].ops[0]).toMatchObject({ position: { x: 48, y: 5 } });
  });

  it('continues on the next page with the styles of the remaining runs', () => {
    const paragraph = new Paragraph(words(36)).string(' tail', { bold: true });
    const backend = layout([paragraph]);

    expect(backend.pages).toHaveLength(2);
    expect(texts(backend.pages[0].ops)).toEqual([words(9), words(9), words(9), words(9)]);
    expect(backend.pages[1].ops).toEqual([
      {
        op: 'text',
        position: { x: 5, y: 5 },
        text: 'tail',
        style: { fontFamily: 'Test', fontSize: 10, color: { r: 0, g: 0, b: 0 }, bold: true, italic: false },
      },
    ]);
  });

  it('sizes a mixed line by its largest font', () => {
    const backend = layout([new Paragraph('small ').string('BIG', { fontSize: 20 }), text('next')]);
    const ops = backend.pages[0].ops;
    expect(texts(ops)).toEqual(['small ', 'BIG', 'next']);
    expect(ops[1]).toMatchObject({ position: { x: 11, y: 5 }, style: { fontSize: 20 } });
    expect(ops[2]).toMatchObject({ position: { x: 5, y: 15 } });
  });

  it('applies the document line spacing', () => {
    const doc = smallDocument().setLineSpacing(2);
    const backend = layout([text('a'), text('b')], doc);
    expect(backend.pages[0].ops[1]).toMatchObject({ text: 'b', position: { x: 5, y: 15 } });
  });

  it('takes no space when empty', () => {
    const backend = layout([new Paragraph(), text('after')]);
    expect(backend.pages[0].ops).toHaveLength(1);
    expect(backend.pages[0].ops[0]).toMatchObject({ text: 'after', position: { x: 5, y: 5 } });
  });

  it('rejects a word wider than the line', () => {
    const doc = smallDocument().push(new Paragraph('x'.repeat(91)));
    expect(() => layout([], doc)).toThrow(LayoutError);
    expect(() => layout([], smallDocument().push(new Paragraph('x'.repeat(91))))).toThrow(
      /is wider than the available line \(91\.00mm > 90\.00mm\)/,
    );
  });
});
