import type { ReactElement } from 'react';
import { renderJson, type RenderJsonOptions } from '@pagewright/core';
import { serialize } from './serialize.js';

/**
 * Render a React element tree to a JSON document string.
 * The top-level element must be a <Document>.
 */
export function render(element: ReactElement): string {
  return JSON.stringify(serialize(element));
}

/**
 * Lay out a React element tree and render it to PDF bytes. Pass `backend`
 * or `fonts` to render elsewhere or with other metrics.
 */
export function renderToPdf(element: ReactElement, options: RenderJsonOptions = {}): Promise<Uint8Array> {
  return renderJson(serialize(element), options);
}
