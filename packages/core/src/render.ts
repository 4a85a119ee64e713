import type { Area } from './area.js';
import { resolveIn, withStyle, type RenderContext } from './context.js';
import {
  LinearLayout,
  Paragraph,
  styled,
  type BreakElement,
  type Element,
  type FramedElement,
  type PaddedElement,
  type StyledElement,
  type TextElement,
} from './elements.js';
import { renderTable } from './render-table.js';
import type { Size } from './units.js';
import {
  alignmentOffset,
  drawLine,
  measureFragments,
  tokenize,
  tokensToRuns,
  wrapTokens,
} from './wrap.js';

export type { RenderContext } from './context.js';

/**
 * Result of rendering an element into an area. A continued outcome carries
 * the part still to be rendered on the next page. When nothing could be
 * placed the continuation is the element itself.
 */
export type RenderOutcome =
  | { status: 'complete'; size: Size }
  | { status: 'continued'; size: Size; continuation: Element };

export function complete(width: number, height: number): RenderOutcome {
  return { status: 'complete', size: { width, height } };
}

export function continued(width: number, height: number, continuation: Element): RenderOutcome {
  return { status: 'continued', size: { width, height }, continuation };
}

/** Whether an outcome placed nothing of `element`. */
export function madeNoProgress(outcome: RenderOutcome, element: Element): boolean {
  return outcome.status === 'continued' && outcome.continuation === element;
}

/**
 * Renders `element` below the cursor of `area`. The area itself is left
 * untouched; callers advance it by the returned height.
 */
export function renderElement(element: Element, area: Area, ctx: RenderContext): RenderOutcome {
  const region = area.rest();
  switch (element.type) {
    case 'Text':
      return renderText(element, region, ctx);
    case 'Paragraph':
      return renderParagraph(element, region, ctx);
    case 'LinearLayout':
      return renderLinear(element, region, ctx);
    case 'Table':
      return renderTable(element, region, ctx);
    case 'Break':
      return renderBreak(element, region, ctx);
    case 'PageBreak':
      return continued(region.width, 0, LinearLayout.vertical());
    case 'Styled':
      return renderStyled(element, region, ctx);
    case 'Framed':
      return renderFramed(element, region, ctx);
    case 'Padded':
      return renderPadded(element, region, ctx);
  }
}

function renderText(element: TextElement, area: Area, ctx: RenderContext): RenderOutcome {
  const { text } = element.content;
  const style = resolveIn(ctx, element.content.style);
  const height = ctx.fonts.lineHeight(style) * ctx.lineSpacing;
  if (!area.fits(height)) return continued(area.width, 0, element);
  if (text !== '') area.drawText({ x: 0, y: 0 }, text, style);
  return complete(measureFragments(ctx.fonts, [{ text, style }]), height);
}

function renderParagraph(paragraph: Paragraph, area: Area, ctx: RenderContext): RenderOutcome {
  const tokens = tokenize(paragraph.runs, local => resolveIn(ctx, local));
  const lines = wrapTokens(ctx.fonts, tokens, area.width, ctx.lineSpacing);

  let y = 0;
  let placed = 0;
  for (const line of lines) {
    if (!area.fits(y + line.height)) break;
    drawLine(ctx.fonts, area, line, y, alignmentOffset(paragraph.alignment, area.width, line.width));
    y += line.height;
    placed++;
  }

  const next = lines[placed];
  if (!next) return complete(area.width, y);
  if (placed === 0) return continued(area.width, 0, paragraph);
  const rest = Paragraph.fromRuns(tokensToRuns(tokens.slice(next.start)), paragraph.alignment);
  return continued(area.width, y, rest);
}

function renderLinear(layout: LinearLayout, area: Area, ctx: RenderContext): RenderOutcome {
  const { children } = layout;
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    const outcome = renderElement(child, area, ctx);
    area.advance(outcome.size.height);
    if (outcome.status === 'continued') {
      if (i === 0 && outcome.continuation === child) return continued(area.width, 0, layout);
      const rest = LinearLayout.vertical([outcome.continuation, ...children.slice(i + 1)]);
      return continued(area.width, area.cursor, rest);
    }
  }
  return complete(area.width, area.cursor);
}

function renderBreak(element: BreakElement, area: Area, ctx: RenderContext): RenderOutcome {
  const height = element.lines * ctx.fonts.lineHeight(ctx.style) * ctx.lineSpacing;
  // A break that does not fit ends the page.
  return complete(area.width, Math.min(height, area.remainingHeight));
}

function renderStyled(element: StyledElement, area: Area, ctx: RenderContext): RenderOutcome {
  const outcome = renderElement(element.child, area, withStyle(ctx, element.style));
  if (outcome.status === 'complete') return outcome;
  if (outcome.continuation === element.child) return { ...outcome, continuation: element };
  return { ...outcome, continuation: styled(outcome.continuation, element.style) };
}

function renderPadded(element: PaddedElement, area: Area, ctx: RenderContext): RenderOutcome {
  const { padding, child } = element;
  if (!area.fits(padding.top + padding.bottom)) return continued(area.width, 0, element);
  const outcome = renderElement(child, area.inset(padding), ctx);
  if (madeNoProgress(outcome, child)) return continued(area.width, 0, element);
  const height = padding.top + outcome.size.height + padding.bottom;
  if (outcome.status === 'complete') return complete(area.width, height);
  return continued(area.width, height, { ...element, child: outcome.continuation });
}

/**
 * Draws a frame around the child. When the child continues on the next
 * page the bottom edge is left open here and the top edge is left open on
 * the continuation.
 */
function renderFramed(element: FramedElement, area: Area, ctx: RenderContext): RenderOutcome {
  const { lineStyle, openTop, child } = element;
  const t = lineStyle.thickness;
  const top = openTop ? 0 : t;
  const outcome = renderElement(child, area.inset({ top, right: t, bottom: t, left: t }), ctx);
  if (madeNoProgress(outcome, child)) return continued(area.width, 0, element);

  const { width } = area;
  const closed = outcome.status === 'complete';
  const height = top + outcome.size.height + (closed ? t : 0);
  if (!openTop) area.drawLine({ x: 0, y: t / 2 }, { x: width, y: t / 2 }, lineStyle);
  if (closed) area.drawLine({ x: 0, y: height - t / 2 }, { x: width, y: height - t / 2 }, lineStyle);
  area.drawLine({ x: t / 2, y: 0 }, { x: t / 2, y: height }, lineStyle);
  area.drawLine({ x: width - t / 2, y: 0 }, { x: width - t / 2, y: height }, lineStyle);

  if (outcome.status === 'complete') return complete(width, height);
  return continued(width, height, { ...element, child: outcome.continuation, openTop: true });
}
