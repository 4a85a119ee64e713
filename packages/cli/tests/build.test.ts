import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createElement } from 'react';
import { ConfigurationError } from '@pagewright/core';
import { Document, Text } from '@pagewright/react';
import { buildPdf, loadJsonData, resolveElement } from '../src/build.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'pagewright-cli-'));
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe('buildPdf', () => {
  it('renders a JSON document to a PDF file', async () => {
    const input = join(dir, 'doc.json');
    const output = join(dir, 'doc.pdf');
    await writeFile(input, JSON.stringify({ title: 'Test', children: [{ type: 'Text', text: 'Hello' }] }));

    const result = await buildPdf(input, { output });

    const pdf = await readFile(output);
    expect(result).toEqual({ outputPath: output, bytes: pdf.length });
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(console.log).toHaveBeenCalledWith(`Written ${pdf.length} bytes to ${output}`);
  });

  it('reports invalid JSON documents', async () => {
    const input = join(dir, 'broken.json');
    await writeFile(input, '{ "children": ');
    await expect(buildPdf(input, { output: join(dir, 'out.pdf') })).rejects.toThrow(ConfigurationError);
  });

  it('warns that data is ignored for JSON input', async () => {
    const input = join(dir, 'doc.json');
    await writeFile(input, JSON.stringify({ children: [] }));
    await buildPdf(input, { output: join(dir, 'out.pdf'), dataPath: 'data.json' });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('renders a template function with the data file', async () => {
    const input = join(dir, 'greeting.tsx');
    const dataPath = join(dir, 'data.json');
    const output = join(dir, 'greeting.pdf');
    await writeFile(join(dir, 'title.ts'), 'export const title = (name: string) => `Hello ${name}`;\n');
    await writeFile(
      input,
      [
        "import { Document, Text } from '@pagewright/react';",
        "import { title } from './title';",
        'export default function Greeting(data: { name: string }) {',
        '  return <Document title={title(data.name)}><Text>{title(data.name)}</Text></Document>;',
        '}',
      ].join('\n'),
    );
    await writeFile(dataPath, JSON.stringify({ name: 'Tester' }));

    const result = await buildPdf(input, { output, dataPath });

    const pdf = await readFile(output);
    expect(result.bytes).toBe(pdf.length);
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pdf.toString('latin1')).toContain('/Title (Hello Tester)');
  });

  it('renders a static template element', async () => {
    const input = join(dir, 'static.tsx');
    await writeFile(
      input,
      "import { Document, Text } from '@pagewright/react';\nexport default <Document><Text>Static</Text></Document>;\n",
    );
    const result = await buildPdf(input, { output: join(dir, 'static.pdf') });
    expect(result.bytes).toBeGreaterThan(0);
  });

  it('reports template compile errors with their location', async () => {
    const input = join(dir, 'broken.tsx');
    await writeFile(input, 'export default <Document></Text>;\n');
    const failure = buildPdf(input, { output: join(dir, 'out.pdf') });
    await expect(failure).rejects.toThrow(`Could not compile ${input}`);
    await expect(failure).rejects.toThrow('broken.tsx:1:');
  });

  it('rejects HTML elements in templates', async () => {
    const input = join(dir, 'html.tsx');
    await writeFile(
      input,
      "import { Document } from '@pagewright/react';\nexport default <Document><div>x</div></Document>;\n",
    );
    await expect(buildPdf(input, { output: join(dir, 'out.pdf') })).rejects.toThrow(
      'HTML element <div> is not supported. Use <View> instead.',
    );
  });

  it('rejects unknown file types', async () => {
    await expect(buildPdf(join(dir, 'doc.txt'), { output: join(dir, 'out.pdf') })).rejects.toThrow(
      'Unsupported input file'
    );
  });
});

describe('resolveElement', () => {
  const element = createElement(Document, null, createElement(Text, null, 'hi'));

  it('returns a static default export', async () => {
    await expect(resolveElement({ default: element })).resolves.toBe(element);
  });

  it('calls a default export function with the data file', async () => {
    const dataPath = join(dir, 'data.json');
    await writeFile(dataPath, JSON.stringify({ title: 'Q4' }));
    const template = vi.fn((_data: unknown) => element);

    await expect(resolveElement({ default: template }, dataPath)).resolves.toBe(element);
    expect(template).toHaveBeenCalledWith({ title: 'Q4' });
  });

  it('requires a default export', async () => {
    await expect(resolveElement({})).rejects.toThrow('No default export found.');
  });

  it('rejects a function that returns no element', async () => {
    await expect(resolveElement({ default: () => 42 })).rejects.toThrow(
      'Default export function did not return a valid element.'
    );
  });
});

describe('loadJsonData', () => {
  it('explains malformed data files', async () => {
    const dataPath = join(dir, 'bad.json');
    await writeFile(dataPath, 'not json');
    await expect(loadJsonData(dataPath)).rejects.toThrow(`Failed to parse data file as JSON: ${dataPath}`);
  });
});
