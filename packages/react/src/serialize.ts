import { type ReactElement, isValidElement, Children, Fragment, type ReactNode } from 'react';
import {
  expandEdges,
  mergeStyles,
  type CellDecoratorJson,
  type Color,
  type DocumentJson,
  type ElementJson,
  type RunJson,
  type TableRowJson,
  type Style as TextStyle,
} from '@pagewright/core';
import { Document, Header, View, Text, Line, Table, Row, Cell, Break, PageBreak } from './components.js';
import type {
  CellProps,
  DocumentProps,
  Edges,
  HeaderProps,
  LineProps,
  RowProps,
  Style,
  TableBorders,
  TableProps,
  TextProps,
  ViewProps,
} from './types.js';

// ─── Nesting validation ──────────────────────────────────────────────

type ParentContext = 'Document' | 'Header' | 'View' | 'Table' | 'Row' | 'Cell';

const VALID_PARENTS: Record<string, { allowed: ParentContext[]; suggestion: string }> = {
  Header: {
    allowed: ['Document'],
    suggestion: '<Header> must be a direct child of <Document>.',
  },
  Row: {
    allowed: ['Table'],
    suggestion: '<Row> must be inside a <Table>. Wrap it: <Table><Row>...</Row></Table>',
  },
  Cell: {
    allowed: ['Row'],
    suggestion: '<Cell> must be inside a <Row>. Wrap it: <Row><Cell>...</Cell></Row>',
  },
};

function validateNesting(componentName: string, parent: ParentContext): void {
  const rule = VALID_PARENTS[componentName];
  if (!rule) return;
  if (!rule.allowed.includes(parent)) {
    throw new Error(
      `Invalid nesting: <${componentName}> found inside <${parent}>. ${rule.suggestion}`
    );
  }
}

const HTML_SUGGESTIONS: Record<string, string> = {
  div: 'View', section: 'View', span: 'Text', p: 'Text', h1: 'Text', h2: 'Text',
  h3: 'Text', br: 'Break', hr: 'Break', table: 'Table', tr: 'Row', td: 'Cell', th: 'Cell',
};

function rejectHtml(tag: string): never {
  const suggestion = HTML_SUGGESTIONS[tag];
  throw new Error(
    suggestion
      ? `HTML element <${tag}> is not supported. Use <${suggestion}> instead.`
      : `HTML element <${tag}> is not supported.`
  );
}

function isElement(value: unknown): value is ReactElement {
  return isValidElement(value);
}

// ─── Public API ──────────────────────────────────────────────────────

/**
 * Serialize a React element tree into a JSON document.
 * The top-level element must be a <Document>.
 */
export function serialize(element: ReactElement): DocumentJson {
  if (element.type !== Document) {
    throw new Error('Top-level element must be <Document>');
  }

  const props: DocumentProps = element.props;
  const result: DocumentJson = { children: [] };
  if (props.title !== undefined) result.title = props.title;
  if (props.paperSize !== undefined) result.paperSize = props.paperSize;
  if (props.margin !== undefined) result.margins = props.margin;
  if (props.fontFamily !== undefined) result.fontFamily = props.fontFamily;
  if (props.fontSize !== undefined) result.fontSize = props.fontSize;
  if (props.lineSpacing !== undefined) result.lineSpacing = props.lineSpacing;

  for (const child of flattenChildren(props.children)) {
    if (isElement(child) && child.type === Header) {
      if (result.header) throw new Error('A <Document> can have only one <Header>');
      result.header = serializeHeader(child);
      continue;
    }
    const node = serializeChild(child, 'Document');
    if (node) result.children.push(node);
  }

  return result;
}

// ─── Node serialization ─────────────────────────────────────────────

function serializeChild(child: unknown, parent: ParentContext): ElementJson | null {
  if (child === null || child === undefined || typeof child === 'boolean') {
    return null;
  }

  if (typeof child === 'string' || typeof child === 'number') {
    return { type: 'Paragraph', runs: [{ text: String(child) }] };
  }

  if (!isElement(child)) return null;
  const element = child;

  if (typeof element.type === 'string') rejectHtml(element.type);

  if (element.type === View) {
    return serializeView(element);
  }
  if (element.type === Text) {
    return serializeText(element);
  }
  if (element.type === Line) {
    return serializeLine(element);
  }
  if (element.type === Table) {
    return serializeTable(element);
  }
  if (element.type === Row || element.type === Cell || element.type === Header) {
    validateNesting(componentName(element), parent);
    return null;
  }
  if (element.type === Break) {
    const lines: number | undefined = element.props.lines;
    return { type: 'Break', lines: lines ?? 1 };
  }
  if (element.type === PageBreak) {
    return { type: 'PageBreak' };
  }
  if (element.type === Document) {
    throw new Error('<Document> can only be the top-level element');
  }
  if (element.type === Fragment) {
    return stack(serializeChildren(flattenChildren(element.props.children), parent));
  }

  const rendered = renderComponent(element);
  return rendered === element ? null : serializeChild(rendered, parent);
}

const BUILTIN_COMPONENTS = new Map<unknown, string>([
  [Document, 'Document'], [Header, 'Header'], [View, 'View'], [Text, 'Text'], [Line, 'Line'],
  [Table, 'Table'], [Row, 'Row'], [Cell, 'Cell'], [Break, 'Break'], [PageBreak, 'PageBreak'],
]);

function componentName(element: ReactElement): string {
  return BUILTIN_COMPONENTS.get(element.type) ?? 'Unknown';
}

/**
 * Calls a user function component and returns what it renders. Built-in
 * components and anything else are returned unchanged.
 */
function renderComponent(element: ReactElement): ReactNode {
  const { type } = element;
  if (typeof type !== 'function' || BUILTIN_COMPONENTS.has(type)) return element;
  if (type.prototype?.isReactComponent) {
    throw new Error(`Class component <${type.name}> is not supported; use a function component`);
  }
  return (type as (props: unknown) => ReactNode)(element.props);
}

function serializeHeader(element: ReactElement): NonNullable<DocumentJson['header']> {
  const props: HeaderProps = element.props;
  const header: NonNullable<DocumentJson['header']> = {
    element: stack(serializeChildren(flattenChildren(props.children), 'Header')),
  };
  if (props.firstPage !== undefined) header.firstPage = props.firstPage;
  return header;
}

function serializeView(element: ReactElement): ElementJson {
  const props: ViewProps = element.props;
  const children = serializeChildren(flattenChildren(props.children), 'View');
  return wrapBox({ type: 'LinearLayout', children }, props.style);
}

function serializeText(element: ReactElement): ElementJson {
  const props: TextProps = element.props;
  const paragraph: Extract<ElementJson, { type: 'Paragraph' }> = {
    type: 'Paragraph',
    runs: collectRuns(props.children, undefined),
  };
  if (props.style?.textAlign !== undefined) paragraph.alignment = props.style.textAlign;
  return wrapBox(paragraph, props.style);
}

function serializeLine(element: ReactElement): ElementJson {
  const props: LineProps = element.props;
  const text = collectRuns(props.children, undefined).map(run => run.text).join('');
  return wrapBox({ type: 'Text', text }, props.style);
}

function serializeTable(element: ReactElement): ElementJson {
  const props: TableProps = element.props;
  const table: Extract<ElementJson, { type: 'Table' }> = {
    type: 'Table',
    columnWeights: [...props.columns],
    rows: [],
  };
  const decorator = mapBorders(props.borders);
  if (decorator) table.cellDecorator = decorator;

  for (const child of flattenChildren(props.children)) {
    if (!isElement(child)) continue;
    if (child.type === Cell) validateNesting('Cell', 'Table');
    if (child.type !== Row) throw new Error('<Table> may only contain <Row> elements');
    table.rows.push(serializeRow(child));
  }
  return table;
}

function serializeRow(element: ReactElement): TableRowJson {
  const props: RowProps = element.props;
  const cells: ElementJson[] = [];
  for (const child of flattenChildren(props.children)) {
    if (!isElement(child)) continue;
    if (child.type !== Cell) throw new Error('<Row> may only contain <Cell> elements');
    cells.push(serializeCell(child));
  }
  const row: TableRowJson = { cells };
  if (props.style?.backgroundColor !== undefined) row.backgroundColor = parseColor(props.style.backgroundColor);
  return row;
}

function serializeCell(element: ReactElement): ElementJson {
  const props: CellProps = element.props;
  return wrapBox(stack(serializeChildren(flattenChildren(props.children), 'Cell')), props.style);
}

// ─── Children ───────────────────────────────────────────────────────

/** Flattens arrays and fragments, rendering user components on the way. */
function flattenChildren(children: ReactNode): unknown[] {
  const result: unknown[] = [];
  Children.forEach(children, child => {
    const resolved = isElement(child) ? renderComponent(child) : child;
    if (resolved !== child) {
      result.push(...flattenChildren(resolved));
    } else if (isElement(child) && child.type === Fragment) {
      result.push(...flattenChildren(child.props.children));
    } else if (child !== null && child !== undefined) {
      result.push(child);
    }
  });
  return result;
}

function serializeChildren(children: unknown[], parent: ParentContext): ElementJson[] {
  const nodes: ElementJson[] = [];
  for (const child of children) {
    const node = serializeChild(child, parent);
    if (node) nodes.push(node);
  }
  return nodes;
}

function stack(children: ElementJson[]): ElementJson {
  return children.length === 1 ? children[0] : { type: 'LinearLayout', children };
}

/**
 * Collect the runs of a <Text>. Nested <Text> children become runs of
 * their own, styled by every enclosing nested <Text>.
 */
function collectRuns(children: ReactNode, inherited: TextStyle | undefined): RunJson[] {
  const runs: RunJson[] = [];
  for (const child of flattenChildren(children)) {
    if (typeof child === 'string' || typeof child === 'number') {
      runs.push(inherited ? { text: String(child), style: inherited } : { text: String(child) });
      continue;
    }
    if (!isElement(child)) continue;
    if (typeof child.type === 'string') rejectHtml(child.type);
    if (child.type !== Text) {
      throw new Error('<Text> may only contain text and nested <Text> elements');
    }
    const props: TextProps = child.props;
    const own = mapTextStyle(props.style);
    const style = own && inherited ? mergeStyles(inherited, own) : own ?? inherited;
    runs.push(...collectRuns(props.children, style));
  }
  return runs;
}

// ─── Style mapping ──────────────────────────────────────────────────

/** Wraps `element` in the padding, border and text style of `style`. */
function wrapBox(element: ElementJson, style: Style | undefined): ElementJson {
  let result = element;
  const padding = mapPadding(style);
  if (padding) result = { type: 'Padded', padding, child: result };
  if (style?.borderWidth) {
    result = {
      type: 'Framed',
      lineStyle: { thickness: style.borderWidth, color: parseColor(style.borderColor ?? '#000') },
      child: result,
    };
  }
  const text = mapTextStyle(style);
  if (text) result = { type: 'Styled', style: text, child: result };
  return result;
}

export function mapTextStyle(style?: Style): TextStyle | undefined {
  if (!style) return undefined;

  const result: TextStyle = {};
  if (style.fontFamily !== undefined) result.fontFamily = style.fontFamily;
  if (style.fontSize !== undefined) result.fontSize = style.fontSize;
  if (style.color !== undefined) result.color = parseColor(style.color);
  if (style.fontWeight !== undefined) result.bold = isBold(style.fontWeight);
  if (style.fontStyle !== undefined) result.italic = style.fontStyle !== 'normal';

  return Object.keys(result).length > 0 ? result : undefined;
}

function isBold(weight: number | 'normal' | 'bold'): boolean {
  if (weight === 'bold') return true;
  if (weight === 'normal') return false;
  return weight >= 600;
}

/** Padding edges, most specific first: individual > axis > base. */
export function mapPadding(style?: Style): Edges | undefined {
  if (!style) return undefined;
  if (style.padding === undefined && style.paddingTop === undefined && style.paddingRight === undefined
    && style.paddingBottom === undefined && style.paddingLeft === undefined
    && style.paddingHorizontal === undefined && style.paddingVertical === undefined) {
    return undefined;
  }
  const base = expandEdges(style.padding ?? 0);
  return {
    top: style.paddingTop ?? style.paddingVertical ?? base.top,
    right: style.paddingRight ?? style.paddingHorizontal ?? base.right,
    bottom: style.paddingBottom ?? style.paddingVertical ?? base.bottom,
    left: style.paddingLeft ?? style.paddingHorizontal ?? base.left,
  };
}

function mapBorders(borders: boolean | TableBorders | undefined): CellDecoratorJson | undefined {
  if (!borders) return undefined;
  const options: TableBorders = borders === true ? {} : borders;
  const decorator: CellDecoratorJson = {
    inner: options.inner ?? true,
    outer: options.outer ?? true,
    continuation: options.continuation ?? true,
  };
  const lineStyle: NonNullable<CellDecoratorJson['lineStyle']> = {};
  if (options.width !== undefined) lineStyle.thickness = options.width;
  if (options.color !== undefined) lineStyle.color = parseColor(options.color);
  if (Object.keys(lineStyle).length > 0) decorator.lineStyle = lineStyle;
  return decorator;
}

/** Parse `#rgb` or `#rrggbb` into 0-255 channels. Anything else is black. */
export function parseColor(hex: string): Color {
  const h = hex.replace(/^#/, '');

  if (/^[0-9a-f]{3}$/i.test(h)) {
    return {
      r: parseInt(h[0] + h[0], 16),
      g: parseInt(h[1] + h[1], 16),
      b: parseInt(h[2] + h[2], 16),
    };
  }

  if (/^[0-9a-f]{6}$/i.test(h)) {
    return {
      r: parseInt(h.slice(0, 2), 16),
      g: parseInt(h.slice(2, 4), 16),
      b: parseInt(h.slice(4, 6), 16),
    };
  }

  return { r: 0, g: 0, b: 0 };
}
