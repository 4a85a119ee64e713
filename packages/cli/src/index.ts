#!/usr/bin/env node

import { existsSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { buildPdf } from './build.js';

const USAGE = `
pagewright - Paginated document layout

Usage:
  pagewright build <file.tsx>   Render a JSX template to PDF
  pagewright build <file.json>  Render a JSON document to PDF

Options:
  -o, --output <path>     Output PDF path (default: output.pdf)
  -d, --data <path>       JSON data file to pass to a template function
  -h, --help              Show this help message

Examples:
  pagewright build templates/invoice.tsx -o invoice.pdf
  pagewright build report.tsx --data data.json -o report.pdf
  pagewright build document.json

Data flag:
  If your template exports a function instead of a JSX element,
  use --data to pass a JSON file as the function argument:

    // report.tsx
    export default function Report(data: { title: string }) {
      return <Document><Text>{data.title}</Text></Document>
    }
`;

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o', default: 'output.pdf' },
      data: { type: 'string', short: 'd' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(USAGE.trim());
    return;
  }

  const [command, inputPath] = positionals;

  if (command !== 'build') {
    console.error(`Unknown command: ${command}\n`);
    console.log(USAGE.trim());
    process.exitCode = 1;
    return;
  }

  if (!inputPath) {
    console.error(`Error: Missing input file.\n`);
    console.log(USAGE.trim());
    process.exitCode = 1;
    return;
  }

  // Validate input file exists
  const absoluteInput = resolve(inputPath);
  if (!existsSync(absoluteInput)) {
    console.error(`Error: Input file not found: ${absoluteInput}`);
    process.exitCode = 1;
    return;
  }

  // Validate data file exists if provided
  const dataPath = values.data;
  if (dataPath && !existsSync(resolve(dataPath))) {
    console.error(`Error: Data file not found: ${resolve(dataPath)}`);
    process.exitCode = 1;
    return;
  }

  await buildPdf(inputPath, { output: values.output ?? 'output.pdf', dataPath });
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  console.error(`\n  ${message.split('\n').join('\n  ')}\n`);
  process.exit(1);
});
