/**
 * Terminal colors and styles
 */

export const NAMED_COLORS = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'gray',
  'light-red',
  'light-green',
  'light-yellow',
  'light-blue',
  'light-magenta',
  'light-cyan',
  'light-gray',
  'white'
] as const;

export type NamedColor = (typeof NAMED_COLORS)[number];

export type Color =
  | { readonly kind: 'rgb'; readonly r: number; readonly g: number; readonly b: number }
  | { readonly kind: 'named'; readonly name: NamedColor }
  | { readonly kind: 'reset' };

export const MODIFIERS = [
  'bold',
  'dim',
  'italic',
  'underlined',
  'slow_blink',
  'rapid_blink',
  'reversed',
  'hidden',
  'crossed_out'
] as const;

export type Modifier = (typeof MODIFIERS)[number];

export type Style = {
  readonly fg?: Color;
  readonly bg?: Color;
  readonly modifiers?: readonly Modifier[];
};

/** A style with no color and no modifiers */
export const EMPTY_STYLE: Style = Object.freeze({});

/**
 * Anything that maps a scope name to a style, such as a Theme
 */
export interface StyleProvider {
  get(scope: string): Style;
}

const HEX_COLOR = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;

/**
 * Parse a `#RRGGBB` literal
 */
export function parseHexColor(value: string): Color | undefined {
  const match = HEX_COLOR.exec(value);
  if (!match) {
    return undefined;
  }
  const [, r = '', g = '', b = ''] = match;
  return {
    kind: 'rgb',
    r: Number.parseInt(r, 16),
    g: Number.parseInt(g, 16),
    b: Number.parseInt(b, 16)
  };
}

export function isNamedColor(value: string): value is NamedColor {
  return NAMED_COLORS.some((name) => name === value);
}

export function isModifier(value: string): value is Modifier {
  return MODIFIERS.some((modifier) => modifier === value);
}

/**
 * Resolve a theme color string: palette entry, hex literal, ANSI name or "reset"
 */
export function parseColor(
  value: string,
  palette: ReadonlyMap<string, Color> = new Map()
): Color | undefined {
  const fromPalette = palette.get(value);
  if (fromPalette) {
    return fromPalette;
  }
  if (value === 'reset') {
    return { kind: 'reset' };
  }
  if (isNamedColor(value)) {
    return { kind: 'named', name: value };
  }
  return parseHexColor(value);
}

export function formatColor(color: Color): string {
  switch (color.kind) {
    case 'rgb':
      return `#${[color.r, color.g, color.b].map((c) => c.toString(16).padStart(2, '0')).join('')}`;
    case 'named':
      return color.name;
    case 'reset':
      return 'reset';
  }
}

export function isEmptyStyle(style: Style): boolean {
  return (
    style.fg === undefined &&
    style.bg === undefined &&
    (style.modifiers === undefined || style.modifiers.length === 0)
  );
}
