import type { Style } from './types.js';

export const StyleSheet = {
  create<T extends Record<string, Style>>(styles: T): T {
    return styles;
  },

  /** Later styles override earlier ones; `undefined` and `false` entries are skipped. */
  compose(...styles: Array<Style | undefined | false>): Style {
    const result: Style = {};
    for (const style of styles) {
      if (style) Object.assign(result, style);
    }
    return result;
  },
};
