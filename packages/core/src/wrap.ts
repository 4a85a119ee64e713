import type { Area } from './area.js';
import { EPSILON } from './area.js';
import type { Alignment, StyledString } from './elements.js';
import { LayoutError } from './errors.js';
import type { FontBackend } from './fonts.js';
import { styleKey, type ResolvedStyle, type Style } from './style.js';

/** A piece of a run with its style resolved against the render context. */
export interface Fragment {
  text: string;
  style: ResolvedStyle;
  /** The run's own overrides, kept so a continuation can rebuild the run. */
  local?: Style;
}

export interface Token {
  kind: 'word' | 'space';
  fragments: Fragment[];
}

export interface Line {
  fragments: Fragment[];
  width: number;
  height: number;
  /** Index of the line's first token. */
  start: number;
}

const WHITESPACE = /(\s+)/;

/**
 * Splits runs into words and whitespace. A word continues across a run
 * boundary when no whitespace separates the runs.
 */
export function tokenize(runs: StyledString[], resolve: (local?: Style) => ResolvedStyle): Token[] {
  const tokens: Token[] = [];
  for (const run of runs) {
    const style = resolve(run.style);
    for (const piece of run.text.split(WHITESPACE)) {
      if (piece === '') continue;
      const kind = /^\s/.test(piece) ? 'space' : 'word';
      const fragment: Fragment = run.style ? { text: piece, style, local: run.style } : { text: piece, style };
      const last = tokens[tokens.length - 1];
      if (last && last.kind === kind) {
        last.fragments.push(fragment);
      } else {
        tokens.push({ kind, fragments: [fragment] });
      }
    }
  }
  return tokens;
}

/**
 * Width of fragments drawn back to back: glyph advances plus the kerning of
 * every adjacent pair that shares a style, wherever run boundaries fall.
 */
export function measureFragments(fonts: FontBackend, fragments: Fragment[]): number {
  let width = 0;
  let prev: { char: string; key: string } | undefined;
  for (const fragment of fragments) {
    const key = styleKey(fragment.style);
    const chars = Array.from(fragment.text);
    const advances = fonts.measure(fragment.style, fragment.text);
    chars.forEach((char, i) => {
      if (prev && prev.key === key) width += fonts.kerning(fragment.style, prev.char, char);
      width += advances[i] ?? 0;
      prev = { char, key };
    });
  }
  return width;
}

/** Joins neighbouring fragments that share a style into one. */
export function mergeFragments(fragments: Fragment[]): Fragment[] {
  const merged: Fragment[] = [];
  for (const fragment of fragments) {
    const last = merged[merged.length - 1];
    if (last && styleKey(last.style) === styleKey(fragment.style)) {
      merged[merged.length - 1] = { ...last, text: last.text + fragment.text };
    } else {
      merged.push({ ...fragment });
    }
  }
  return merged;
}

export function lineHeight(fonts: FontBackend, fragments: Fragment[], lineSpacing: number): number {
  let height = 0;
  for (const fragment of fragments) {
    height = Math.max(height, fonts.lineHeight(fragment.style));
  }
  return height * lineSpacing;
}

function measureWord(fonts: FontBackend, token: Token, maxWidth: number): number {
  const width = measureFragments(fonts, token.fragments);
  if (width > maxWidth + EPSILON) {
    const word = token.fragments.map(f => f.text).join('');
    throw new LayoutError(
      `Word "${word}" is wider than the available line (${width.toFixed(2)}mm > ${maxWidth.toFixed(2)}mm)`,
    );
  }
  return width;
}

/**
 * Greedy line breaking: words join the current line while the line still
 * fits, otherwise the line is closed. Whitespace at a break is dropped.
 */
export function wrapTokens(
  fonts: FontBackend,
  tokens: Token[],
  maxWidth: number,
  lineSpacing: number,
): Line[] {
  const lines: Line[] = [];
  let current: Fragment[] = [];
  let currentWidth = 0;
  let start = 0;
  let pendingSpace: Token | undefined;

  tokens.forEach((token, index) => {
    if (token.kind === 'space') {
      if (current.length > 0) pendingSpace = token;
      return;
    }
    if (current.length > 0) {
      const candidate = [...current, ...(pendingSpace?.fragments ?? []), ...token.fragments];
      const width = measureFragments(fonts, candidate);
      pendingSpace = undefined;
      if (width <= maxWidth + EPSILON) {
        current = candidate;
        currentWidth = width;
        return;
      }
      const fragments = mergeFragments(current);
      lines.push({ fragments, width: currentWidth, height: lineHeight(fonts, fragments, lineSpacing), start });
    }
    current = [...token.fragments];
    currentWidth = measureWord(fonts, token, maxWidth);
    start = index;
  });

  if (current.length > 0) {
    const fragments = mergeFragments(current);
    lines.push({ fragments, width: currentWidth, height: lineHeight(fonts, fragments, lineSpacing), start });
  }
  return lines;
}

export function alignmentOffset(alignment: Alignment, available: number, width: number): number {
  switch (alignment) {
    case 'left':
      return 0;
    case 'center':
      return (available - width) / 2;
    case 'right':
      return available - width;
  }
}

/** Emits one text primitive per style change along the line. */
export function drawLine(fonts: FontBackend, area: Area, line: Line, y: number, x: number): void {
  let offset = x;
  for (const fragment of line.fragments) {
    area.drawText({ x: offset, y }, fragment.text, fragment.style);
    offset += measureFragments(fonts, [fragment]);
  }
}

/** Rebuilds runs from tokens, keeping each fragment's own overrides. */
export function tokensToRuns(tokens: Token[]): StyledString[] {
  const runs: StyledString[] = [];
  let lastLocal: Style | undefined;
  for (const token of tokens) {
    for (const fragment of token.fragments) {
      const last = runs[runs.length - 1];
      if (last && lastLocal === fragment.local) {
        last.text += fragment.text;
      } else {
        runs.push(fragment.local ? { text: fragment.text, style: fragment.local } : { text: fragment.text });
        lastLocal = fragment.local;
      }
    }
  }
  return runs;
}
