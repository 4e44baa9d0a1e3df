/**
 * Theme: styles keyed by dotted scope names
 */

import {
  createSilentLogger,
  isTomlSequence,
  isTomlTable,
  type Logger,
  type TomlValue
} from '@tinct/core';
import { type FlavorDocument, INHERITS_KEY } from '@tinct/loader';
import {
  type Color,
  EMPTY_STYLE,
  isModifier,
  type Modifier,
  parseColor,
  parseHexColor,
  type Style,
  type StyleProvider
} from './style.js';

export const PALETTE_KEY = 'palette';

export class Theme implements StyleProvider {
  readonly name: string;
  private readonly styles: ReadonlyMap<string, Style>;

  constructor(name: string, styles: ReadonlyMap<string, Style>) {
    this.name = name;
    this.styles = styles;
  }

  /**
   * Style for `scope`, falling back to shorter dotted prefixes
   * (`ui.text.focus` → `ui.text` → `ui`) and then to the empty style
   */
  get(scope: string): Style {
    let current = scope;
    for (;;) {
      const style = this.styles.get(current);
      if (style) {
        return style;
      }
      const dot = current.lastIndexOf('.');
      if (dot === -1) {
        return EMPTY_STYLE;
      }
      current = current.slice(0, dot);
    }
  }

  scopes(): string[] {
    return [...this.styles.keys()].sort();
  }
}

/**
 * Build a Theme from a resolved theme document
 *
 * Unresolvable colors and unknown modifiers are logged and left out.
 */
export function buildTheme(
  name: string,
  document: FlavorDocument,
  logger: Logger = createSilentLogger()
): Theme {
  const palette = readPalette(document[PALETTE_KEY], logger);
  const styles = new Map<string, Style>();

  for (const [scope, value] of Object.entries(document)) {
    if (scope === INHERITS_KEY || scope === PALETTE_KEY) {
      continue;
    }
    const style = readStyle(scope, value, palette, logger);
    if (style) {
      styles.set(scope, Object.freeze(style));
    }
  }

  return new Theme(name, styles);
}

function readPalette(value: TomlValue | undefined, logger: Logger): Map<string, Color> {
  const palette = new Map<string, Color>();
  if (value === undefined) {
    return palette;
  }
  if (!isTomlTable(value)) {
    logger.warn({ palette: value }, 'Theme palette must be a table');
    return palette;
  }

  for (const [name, entry] of Object.entries(value)) {
    const color = typeof entry === 'string' ? parseHexColor(entry) : undefined;
    if (color) {
      palette.set(name, color);
    } else {
      logger.warn({ name, value: entry }, 'Palette colors must be #RRGGBB literals');
    }
  }
  return palette;
}

function readColor(
  scope: string,
  value: TomlValue | undefined,
  palette: ReadonlyMap<string, Color>,
  logger: Logger
): Color | undefined {
  if (value === undefined) {
    return undefined;
  }
  const color = typeof value === 'string' ? parseColor(value, palette) : undefined;
  if (!color) {
    logger.warn({ scope, value }, 'Ignoring unknown theme color');
  }
  return color;
}

function readModifiers(scope: string, value: TomlValue | undefined, logger: Logger): Modifier[] {
  if (value === undefined) {
    return [];
  }
  const entries = isTomlSequence(value) ? value : [value];
  const modifiers: Modifier[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string' && isModifier(entry)) {
      modifiers.push(entry);
    } else {
      logger.warn({ scope, modifier: entry }, 'Ignoring unknown theme modifier');
    }
  }
  return modifiers;
}

function readStyle(
  scope: string,
  value: TomlValue,
  palette: ReadonlyMap<string, Color>,
  logger: Logger
): Style | undefined {
  if (typeof value === 'string') {
    const fg = readColor(scope, value, palette, logger);
    return fg ? { fg } : undefined;
  }
  if (!isTomlTable(value)) {
    logger.warn({ scope, value }, 'Theme entries must be a color string or a table');
    return undefined;
  }

  const fg = readColor(scope, value.fg, palette, logger);
  const bg = readColor(scope, value.bg, palette, logger);
  const modifiers = readModifiers(scope, value.modifiers, logger);
  return {
    ...(fg && { fg }),
    ...(bg && { bg }),
    ...(modifiers.length > 0 && { modifiers })
  };
}
