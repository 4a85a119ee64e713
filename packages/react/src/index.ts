// Components
export { Document, Header, View, Text, Line, Table, Row, Cell, Break, PageBreak } from './components.js';

// Serialization
export { serialize, mapTextStyle, mapPadding, parseColor } from './serialize.js';

// StyleSheet
export { StyleSheet } from './stylesheet.js';

// Render functions
export { render, renderToPdf } from './render.js';

// Types
export type {
  Style,
  Edges,
  DocumentProps,
  HeaderProps,
  ViewProps,
  TextProps,
  LineProps,
  TableBorders,
  TableProps,
  RowProps,
  RowStyle,
  CellProps,
  BreakProps,
} from './types.js';
export type { DocumentJson, ElementJson } from '@pagewright/core';
