import { readFile, writeFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { isValidElement, type ReactElement } from 'react';
import { renderJson } from '@pagewright/core';
import { renderToPdf } from '@pagewright/react';
import { loadTemplateModule } from './template.js';

export interface BuildOptions {
  output: string;
  dataPath?: string;
}

export interface BuildResult {
  outputPath: string;
  bytes: number;
}

const TEMPLATE_EXTENSIONS = new Set(['.tsx', '.jsx', '.ts', '.js', '.mjs']);

/**
 * Render a `.json` document or a JSX template to a PDF file.
 * Failures are thrown; the caller decides how to report them.
 */
export async function buildPdf(inputPath: string, options: BuildOptions): Promise<BuildResult> {
  const absoluteInput = resolve(inputPath);
  console.log(`Building ${absoluteInput}...`);

  const extension = extname(absoluteInput).toLowerCase();
  let pdf: Uint8Array;
  if (extension === '.json') {
    if (options.dataPath) {
      console.warn(
        `Warning: --data flag provided but the input is a JSON document.\n` +
        `  The data file will be ignored.`
      );
    }
    pdf = await renderJson(await readFile(absoluteInput, 'utf-8'));
  } else if (TEMPLATE_EXTENSIONS.has(extension)) {
    pdf = await renderToPdf(await loadTemplate(absoluteInput, options.dataPath));
  } else {
    throw new Error(`Unsupported input file: ${absoluteInput}\n  Expected a .tsx, .jsx or .json file.`);
  }

  const outputPath = resolve(options.output);
  await writeFile(outputPath, pdf);
  console.log(`Written ${pdf.length} bytes to ${outputPath}`);
  return { outputPath, bytes: pdf.length };
}

async function loadTemplate(absoluteInput: string, dataPath?: string): Promise<ReactElement> {
  return resolveElement(await loadTemplateModule(absoluteInput), dataPath);
}

export async function resolveElement(
  mod: Record<string, unknown>,
  dataPath?: string,
): Promise<ReactElement> {
  const exported = mod.default;

  if (exported === undefined) {
    throw new Error(
      `No default export found.\n\n` +
      `  Your file must export a document element or a function that returns one:\n\n` +
      `    export default (\n` +
      `      <Document>\n` +
      `        <Text>Hello</Text>\n` +
      `      </Document>\n` +
      `    );\n\n` +
      `  Or with data:\n\n` +
      `    export default function Report(data) {\n` +
      `      return <Document><Text>{data.title}</Text></Document>\n` +
      `    }`
    );
  }

  if (typeof exported === 'function') {
    const data = dataPath ? await loadJsonData(dataPath) : {};
    const result: unknown = await exported(data);
    if (!isValidElement(result)) {
      throw new Error(
        `Default export function did not return a valid element.\n` +
        `  Got: ${typeof result}\n` +
        `  Make sure your function returns a <Document> element.`
      );
    }
    return result;
  }

  if (isValidElement(exported)) {
    if (dataPath) {
      console.warn(
        `Warning: --data flag provided but default export is a static element, not a function.\n` +
        `  The data file will be ignored. Export a function to use --data.`
      );
    }
    return exported;
  }

  throw new Error(
    `Default export is not a valid element.\n` +
    `  Got: ${typeof exported}\n` +
    `  Expected: a <Document> element or a function that returns one.`
  );
}

export async function loadJsonData(dataPath: string): Promise<unknown> {
  const absolutePath = resolve(dataPath);
  const raw = await readFile(absolutePath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse data file as JSON: ${absolutePath}\n` +
      `  Make sure the file contains valid JSON.`,
      { cause: err }
    );
  }
}
