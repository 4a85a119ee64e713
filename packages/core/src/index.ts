export { ConfigurationError, LayoutError, RenderBackendError } from './errors.js';

export {
  MM_PER_PT,
  NO_EDGES,
  PAPER_SIZES,
  expandEdges,
  mmToPt,
  ptToMm,
  resolvePaperSize,
} from './units.js';
export type { Edges, PaperSize, PaperSizeName, Point, Rect, Size } from './units.js';

export {
  BLACK,
  DEFAULT_LINE_STYLE,
  lineStyle,
  mergeStyles,
  resolveStyle,
  rgb,
  styleKey,
} from './style.js';
export type { Color, LineStyle, ResolvedStyle, Style } from './style.js';

export {
  STANDARD_FAMILIES,
  StandardFontBackend,
  faceName,
  resolveFamily,
  standardFamily,
} from './fonts.js';
export type { FontBackend, FontFamily } from './fonts.js';

export { RecordingBackend } from './backend.js';
export type { Canvas, DrawOp, LayoutInfo, PageInfo, Paint, RenderBackend } from './backend.js';
export { PdfRenderBackend } from './pdf-backend.js';
export type { PdfBackendOptions } from './pdf-backend.js';

export { Area } from './area.js';

export {
  LinearLayout,
  Paragraph,
  TableLayout,
  TableRowBuilder,
  framed,
  lineBreak,
  padded,
  pageBreak,
  styled,
  text,
} from './elements.js';
export type {
  Alignment,
  BreakElement,
  Element,
  FramedElement,
  PaddedElement,
  PageBreakElement,
  PushResult,
  StyledElement,
  StyledString,
  TableResume,
  TableRow,
  TextElement,
} from './elements.js';

export { FrameCellDecorator, SimplePageDecorator } from './decorators.js';
export type {
  CellBorders,
  CellContext,
  CellDecorator,
  HeaderFn,
  PageDecorator,
} from './decorators.js';

export { complete, continued, renderElement } from './render.js';
export type { RenderContext, RenderOutcome } from './render.js';
export { columnWidths } from './render-table.js';

export { Document } from './document.js';
export type { DocumentOptions, RenderOptions, RenderState, RenderStateName } from './document.js';

export {
  buildDocument,
  buildElement,
  colorSchema,
  documentSchema,
  elementSchema,
  parseDocument,
  renderJson,
  styleSchema,
} from './json.js';
export type {
  CellDecoratorJson,
  DocumentJson,
  ElementJson,
  RenderJsonOptions,
  RunJson,
  TableRowJson,
} from './json.js';
