/**
 * Terminal rendering of styles and icons with chalk
 */

import defaultChalk, {
  type BackgroundColorName,
  Chalk,
  type ChalkInstance,
  type ColorSupportLevel,
  type ForegroundColorName,
  type ModifierName
} from 'chalk';
import { isErr } from '@tinct/core';
import type { Icon } from '@tinct/icons';
import { type FlavorLoader, tryResolveFlavor } from '@tinct/loader';
import {
  type Color,
  formatColor,
  isEmptyStyle,
  type Modifier,
  type NamedColor,
  type Style
} from '@tinct/theme';

const FOREGROUND: Record<NamedColor, ForegroundColorName> = {
  black: 'black',
  red: 'red',
  green: 'green',
  yellow: 'yellow',
  blue: 'blue',
  magenta: 'magenta',
  cyan: 'cyan',
  gray: 'gray',
  'light-red': 'redBright',
  'light-green': 'greenBright',
  'light-yellow': 'yellowBright',
  'light-blue': 'blueBright',
  'light-magenta': 'magentaBright',
  'light-cyan': 'cyanBright',
  'light-gray': 'white',
  white: 'whiteBright'
};

const BACKGROUND: Record<NamedColor, BackgroundColorName> = {
  black: 'bgBlack',
  red: 'bgRed',
  green: 'bgGreen',
  yellow: 'bgYellow',
  blue: 'bgBlue',
  magenta: 'bgMagenta',
  cyan: 'bgCyan',
  gray: 'bgGray',
  'light-red': 'bgRedBright',
  'light-green': 'bgGreenBright',
  'light-yellow': 'bgYellowBright',
  'light-blue': 'bgBlueBright',
  'light-magenta': 'bgMagentaBright',
  'light-cyan': 'bgCyanBright',
  'light-gray': 'bgWhite',
  white: 'bgWhiteBright'
};

// Blinking has no chalk counterpart
const MODIFIERS: Partial<Record<Modifier, ModifierName>> = {
  bold: 'bold',
  dim: 'dim',
  italic: 'italic',
  underlined: 'underline',
  reversed: 'inverse',
  hidden: 'hidden',
  crossed_out: 'strikethrough'
};

/**
 * Chalk for stdout: colors only where chalk detects a color terminal, raised
 * to 24-bit when the terminal renders it
 */
export function createTerminalChalk(
  supportsTrueColor: boolean,
  detected: ColorSupportLevel = defaultChalk.level
): ChalkInstance {
  return new Chalk({ level: supportsTrueColor && detected > 0 ? 3 : detected });
}

function withForeground(chalk: ChalkInstance, color: Color): ChalkInstance {
  switch (color.kind) {
    case 'rgb':
      return chalk.rgb(color.r, color.g, color.b);
    case 'named':
      return chalk[FOREGROUND[color.name]];
    case 'reset':
      return chalk;
  }
}

function withBackground(chalk: ChalkInstance, color: Color): ChalkInstance {
  switch (color.kind) {
    case 'rgb':
      return chalk.bgRgb(color.r, color.g, color.b);
    case 'named':
      return chalk[BACKGROUND[color.name]];
    case 'reset':
      return chalk;
  }
}

export function paint(chalk: ChalkInstance, style: Style, text: string): string {
  let painter = chalk;
  if (style.fg) {
    painter = withForeground(painter, style.fg);
  }
  if (style.bg) {
    painter = withBackground(painter, style.bg);
  }
  for (const modifier of style.modifiers ?? []) {
    const name = MODIFIERS[modifier];
    if (name) {
      painter = painter[name];
    }
  }
  return painter(text);
}

export function renderIcon(chalk: ChalkInstance, icon: Icon): string {
  return icon.style ? paint(chalk, icon.style.style, icon.glyph) : icon.glyph;
}

/**
 * Plain-text description such as `fg=#ff0000 bg=red bold,italic`
 */
export function describeStyle(style: Style): string {
  if (isEmptyStyle(style)) {
    return '(none)';
  }
  const parts: string[] = [];
  if (style.fg) {
    parts.push(`fg=${formatColor(style.fg)}`);
  }
  if (style.bg) {
    parts.push(`bg=${formatColor(style.bg)}`);
  }
  if (style.modifiers && style.modifiers.length > 0) {
    parts.push(style.modifiers.join(','));
  }
  return parts.join(' ');
}

/**
 * One line per flavor name, `*` marking the selected one and a note on
 * flavors that fail to resolve
 */
export function formatFlavorList(
  loader: FlavorLoader,
  names: readonly string[],
  selected: string
): string[] {
  return names.map((name) => {
    const line = `${name === selected ? '*' : ' '} ${name}`;
    const resolved = tryResolveFlavor(loader, name);
    return isErr(resolved) ? `${line} (error: ${resolved.error.message})` : line;
  });
}

/**
 * Rows of `key  value`, with keys padded to the widest
 */
export function formatRows(rows: Array<[string, string]>, indent = '  '): string[] {
  const width = Math.max(0, ...rows.map(([key]) => key.length));
  return rows.map(([key, value]) => `${indent}${key.padEnd(width)}  ${value}`);
}
