import type { FontBackend } from './fonts.js';
import { resolveFamily } from './fonts.js';
import { resolveStyle, type ResolvedStyle, type Style } from './style.js';

/** What an element inherits from its ancestors during a render pass. */
export interface RenderContext {
  readonly fonts: FontBackend;
  readonly style: ResolvedStyle;
  /** Multiplier applied to every line height. */
  readonly lineSpacing: number;
}

/**
 * Resolves local overrides against the context style. A family named by the
 * overrides is checked against the font backend.
 */
export function resolveIn(ctx: RenderContext, local?: Style): ResolvedStyle {
  const style = resolveStyle(ctx.style, local);
  if (local?.fontFamily === undefined) return style;
  const family = resolveFamily(ctx.fonts, style.fontFamily);
  return family.name === style.fontFamily ? style : { ...style, fontFamily: family.name };
}

export function withStyle(ctx: RenderContext, local: Style): RenderContext {
  return { ...ctx, style: resolveIn(ctx, local) };
}
