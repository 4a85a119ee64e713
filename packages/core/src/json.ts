import { z } from 'zod';
import type { RenderBackend } from './backend.js';
import { FrameCellDecorator, SimplePageDecorator } from './decorators.js';
import { Document, type RenderOptions } from './document.js';
import {
  framed,
  lineBreak,
  LinearLayout,
  padded,
  pageBreak,
  Paragraph,
  styled,
  TableLayout,
  text,
  type Alignment,
  type Element,
} from './elements.js';
import { ConfigurationError } from './errors.js';
import { StandardFontBackend, type FontBackend } from './fonts.js';
import { lineStyle, type Color, type LineStyle, type Style } from './style.js';
import type { Edges } from './units.js';

// ── Element JSON types ─────────────────────────────────────────────

export interface RunJson {
  text: string;
  style?: Style;
}

export interface TableRowJson {
  backgroundColor?: Color;
  cells: ElementJson[];
}

export interface CellDecoratorJson {
  inner: boolean;
  outer: boolean;
  continuation: boolean;
  lineStyle?: Partial<LineStyle>;
}

export type ElementJson =
  | { type: 'Text'; text: string; style?: Style }
  | { type: 'Paragraph'; runs: RunJson[]; alignment?: Alignment }
  | { type: 'LinearLayout'; children: ElementJson[] }
  | { type: 'Break'; lines?: number }
  | { type: 'PageBreak' }
  | { type: 'Table'; columnWeights: number[]; rows: TableRowJson[]; cellDecorator?: CellDecoratorJson }
  | { type: 'Styled'; style: Style; child: ElementJson }
  | { type: 'Framed'; lineStyle?: Partial<LineStyle>; child: ElementJson }
  | { type: 'Padded'; padding: number | Edges; child: ElementJson };

// ── Schemas ────────────────────────────────────────────────────────

const channel = z.number().int().min(0).max(255);

export const colorSchema = z.object({ r: channel, g: channel, b: channel });

export const styleSchema = z
  .object({
    fontFamily: z.string().min(1).optional(),
    fontSize: z.number().positive().optional(),
    color: colorSchema.optional(),
    bold: z.boolean().optional(),
    italic: z.boolean().optional(),
  })
  .strict();

const lineStyleSchema = z
  .object({
    thickness: z.number().nonnegative().optional(),
    color: colorSchema.optional(),
  })
  .strict();

const length = z.number().nonnegative();

const edgesSchema = z.union([
  length,
  z.object({ top: length, right: length, bottom: length, left: length }),
]);

const paperSizeSchema = z.union([
  z.enum(['A3', 'A4', 'A5', 'Letter', 'Legal']),
  z.object({ width: z.number().positive(), height: z.number().positive() }),
]);

export const elementSchema: z.ZodType<ElementJson, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('Text'), text: z.string(), style: styleSchema.optional() }),
    z.object({
      type: z.literal('Paragraph'),
      runs: z.array(z.object({ text: z.string(), style: styleSchema.optional() })),
      alignment: z.enum(['left', 'center', 'right']).optional(),
    }),
    z.object({ type: z.literal('LinearLayout'), children: z.array(elementSchema) }),
    z.object({ type: z.literal('Break'), lines: z.number().nonnegative().optional() }),
    z.object({ type: z.literal('PageBreak') }),
    z.object({
      type: z.literal('Table'),
      columnWeights: z.array(z.number().nonnegative()).min(1),
      rows: z.array(z.object({ backgroundColor: colorSchema.optional(), cells: z.array(elementSchema) })),
      cellDecorator: z
        .object({
          inner: z.boolean(),
          outer: z.boolean(),
          continuation: z.boolean(),
          lineStyle: lineStyleSchema.optional(),
        })
        .optional(),
    }),
    z.object({ type: z.literal('Styled'), style: styleSchema, child: elementSchema }),
    z.object({ type: z.literal('Framed'), lineStyle: lineStyleSchema.optional(), child: elementSchema }),
    z.object({ type: z.literal('Padded'), padding: edgesSchema, child: elementSchema }),
  ]),
);

export const documentSchema = z.object({
  title: z.string().optional(),
  paperSize: paperSizeSchema.optional(),
  margins: edgesSchema.optional(),
  fontFamily: z.string().min(1).optional(),
  fontSize: z.number().positive().optional(),
  lineSpacing: z.number().positive().optional(),
  header: z.object({ element: elementSchema, firstPage: z.boolean().optional() }).optional(),
  children: z.array(elementSchema),
});

export type DocumentJson = z.infer<typeof documentSchema>;

// ── Parsing and building ───────────────────────────────────────────

/** Validates a document given as JSON text or as an already parsed value. */
export function parseDocument(input: unknown): DocumentJson {
  let value = input;
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Failed to parse document: ${message}`, { cause: err });
    }
  }
  const result = documentSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid document: ${issues.join('; ')}`);
  }
  return result.data;
}

type TextMap = (text: string) => string;

const identity: TextMap = s => s;

/**
 * Builds the element tree for `json`. `mapText` rewrites every string of
 * text content on the way.
 */
export function buildElement(json: ElementJson, mapText: TextMap = identity): Element {
  const build = (child: ElementJson) => buildElement(child, mapText);
  switch (json.type) {
    case 'Text':
      return text(mapText(json.text), json.style);
    case 'Paragraph':
      return Paragraph.fromRuns(
        json.runs.map(run => ({ ...run, text: mapText(run.text) })),
        json.alignment ?? 'left',
      );
    case 'LinearLayout':
      return LinearLayout.vertical(json.children.map(build));
    case 'Break':
      return lineBreak(json.lines ?? 1);
    case 'PageBreak':
      return pageBreak();
    case 'Table': {
      const table = new TableLayout(json.columnWeights);
      if (json.cellDecorator) {
        const { inner, outer, continuation } = json.cellDecorator;
        table.setCellDecorator(
          new FrameCellDecorator(inner, outer, continuation, lineStyle(json.cellDecorator.lineStyle)),
        );
      }
      for (const row of json.rows) {
        const builder = table.row();
        for (const cell of row.cells) builder.element(build(cell));
        if (row.backgroundColor) builder.setBackgroundColor(row.backgroundColor);
        const result = builder.push();
        if (!result.ok) throw result.error;
      }
      return table;
    }
    case 'Styled':
      return styled(build(json.child), json.style);
    case 'Framed':
      return framed(build(json.child), lineStyle(json.lineStyle));
    case 'Padded':
      return padded(build(json.child), json.padding);
  }
}

const PAGE_NUMBER = /\{\{\s*pageNumber\s*\}\}/g;

export function buildDocument(def: DocumentJson, fonts: FontBackend): Document {
  const doc = new Document({
    fonts,
    fontFamily: def.fontFamily,
    fontSize: def.fontSize,
    lineSpacing: def.lineSpacing,
    paperSize: def.paperSize,
    title: def.title,
  });

  const decorator = new SimplePageDecorator();
  if (def.margins !== undefined) decorator.setMargins(def.margins);
  const { header } = def;
  if (header) {
    decorator.setHeader(page => {
      if (page === 1 && !header.firstPage) return undefined;
      return buildElement(header.element, s => s.replace(PAGE_NUMBER, String(page)));
    });
  }
  doc.setPageDecorator(decorator);

  for (const child of def.children) doc.push(buildElement(child));
  return doc;
}

export interface RenderJsonOptions extends RenderOptions {
  /** Defaults to the standard PDF fonts. */
  fonts?: FontBackend;
  /** Defaults to a PDF backend. */
  backend?: RenderBackend;
}

/** Validates, builds and renders a JSON document. */
export async function renderJson(input: unknown, options: RenderJsonOptions = {}): Promise<Uint8Array> {
  const def = parseDocument(input);
  const doc = buildDocument(def, options.fonts ?? new StandardFontBackend());
  return doc.render(options.backend, options);
}
