import type {
  BreakProps,
  CellProps,
  DocumentProps,
  HeaderProps,
  LineProps,
  RowProps,
  TableProps,
  TextProps,
  ViewProps,
} from './types.js';

/**
 * Root document container. Must be the top-level element.
 *
 * @param props.title - PDF metadata title
 * @param props.paperSize - `"A4"` (default), `"A3"`, `"A5"`, `"Letter"`, `"Legal"` or `{ width, height }` in mm
 * @param props.margin - Page margins in mm, uniform or `{ top, right, bottom, left }`
 * @param props.fontFamily - Default family: `"Helvetica"`, `"Times"` or `"Courier"`
 * @param props.fontSize - Default font size in points
 * @param props.lineSpacing - Line height multiplier
 *
 * @example
 * ```tsx
 * <Document title="Invoice" margin={15}>
 *   <Text>Hello World</Text>
 * </Document>
 * ```
 */
export function Document(_props: DocumentProps): null {
  return null;
}

/**
 * Content drawn at the top of every page. Use `{{pageNumber}}` in text for
 * the current page number. Skipped on the first page unless `firstPage`.
 *
 * @example
 * ```tsx
 * <Header>
 *   <Text style={{ textAlign: 'right' }}>Page {'{{pageNumber}}'}</Text>
 * </Header>
 * ```
 */
export function Header(_props: HeaderProps): null {
  return null;
}

/**
 * A vertical stack of children. `padding`, `borderWidth` and text styles
 * apply to the whole stack.
 */
export function View(_props: ViewProps): null {
  return null;
}

/**
 * A wrapped paragraph. Nested `<Text>` children become styled runs of the
 * same paragraph.
 *
 * @example
 * ```tsx
 * <Text>
 *   Total: <Text style={{ fontWeight: 'bold' }}>$1,234.00</Text>
 * </Text>
 * ```
 */
export function Text(_props: TextProps): null {
  return null;
}

/** A single line of text that is never wrapped. */
export function Line(_props: LineProps): null {
  return null;
}

/**
 * A table with weighted columns. Children must be `<Row>` elements.
 * Rows that do not fit move to the next page; a row whose cell does not
 * fit is split.
 *
 * @example
 * ```tsx
 * <Table columns={[3, 1]} borders>
 *   <Row style={{ backgroundColor: '#eeeeee' }}>
 *     <Cell><Text>Widget</Text></Cell>
 *     <Cell><Text>$10.00</Text></Cell>
 *   </Row>
 * </Table>
 * ```
 */
export function Table(_props: TableProps): null {
  return null;
}

/** A table row. Must be a direct child of `<Table>`, with one `<Cell>` per column. */
export function Row(_props: RowProps): null {
  return null;
}

/** A table cell inside a `<Row>`. */
export function Cell(_props: CellProps): null {
  return null;
}

/** Vertical space of a number of lines. */
export function Break(_props: BreakProps): null {
  return null;
}

/** Content after this element starts on a new page. */
export function PageBreak(_props: object): null {
  return null;
}
