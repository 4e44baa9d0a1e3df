/**
 * Icon Flavor Materializer
 *
 * Turns a merged flavor document into an IconFlavor and settles each icon's
 * style: explicit document colors first, theme defaults for diagnostics
 * second, and true-color degradation last.
 */

import { createSilentLogger, FlavorErrors, type Logger } from '@tinct/core';
import type { FlavorDocument } from '@tinct/loader';
import { EMPTY_STYLE, parseHexColor, type StyleProvider } from '@tinct/theme';
import {
  type DiagnosticIcons,
  type DiagnosticSeverity,
  derived,
  explicit,
  type Icon,
  type IconFlavor,
  isExplicit
} from './icon.js';
import { formatIssues, type IconEntry, IconFlavorDocumentSchema } from './schema.js';

export type MaterializeOptions = {
  theme: StyleProvider;
  supportsTrueColor: boolean;
  logger?: Logger;
};

function toIcon(entry: IconEntry, where: string, logger: Logger): Icon {
  if (entry.color === undefined) {
    return { glyph: entry.icon };
  }
  const color = parseHexColor(entry.color);
  if (!color) {
    logger.warn({ entry: where, color: entry.color }, 'Ignoring invalid icon color');
    return { glyph: entry.icon };
  }
  return { glyph: entry.icon, style: explicit({ fg: color }) };
}

function toIconTable(
  entries: Record<string, IconEntry>,
  section: string,
  logger: Logger
): Record<string, Icon> {
  return Object.fromEntries(
    Object.entries(entries).map(([key, entry]) => [key, toIcon(entry, `${section}.${key}`, logger)])
  );
}

function mapIcons(
  icons: Readonly<Record<string, Icon>>,
  fn: (icon: Icon) => Icon
): Record<string, Icon> {
  return Object.fromEntries(Object.entries(icons).map(([key, icon]) => [key, fn(icon)]));
}

function mapDiagnostics(
  diagnostic: DiagnosticIcons,
  fn: (icon: Icon, severity: DiagnosticSeverity) => Icon
): DiagnosticIcons {
  return {
    error: fn(diagnostic.error, 'error'),
    warning: fn(diagnostic.warning, 'warning'),
    info: fn(diagnostic.info, 'info'),
    hint: fn(diagnostic.hint, 'hint')
  };
}

/**
 * Convert a merged document into an IconFlavor named `name`
 *
 * @throws FlavorError of kind 'conversion' when the document does not match
 * the icon flavor schema
 */
export function convertIconFlavor(
  name: string,
  document: FlavorDocument,
  logger: Logger = createSilentLogger()
): IconFlavor {
  const parsed = IconFlavorDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw FlavorErrors.conversion(name, new Error(formatIssues(parsed.error)));
  }

  const data = parsed.data;
  return {
    name,
    mimeType: toIconTable(data['mime-type'], 'mime-type', logger),
    diagnostic: {
      error: toIcon(data.diagnostic.error, 'diagnostic.error', logger),
      warning: toIcon(data.diagnostic.warning, 'diagnostic.warning', logger),
      info: toIcon(data.diagnostic.info, 'diagnostic.info', logger),
      hint: toIcon(data.diagnostic.hint, 'diagnostic.hint', logger)
    },
    symbolKind: toIconTable(data['symbol-kind'], 'symbol-kind', logger)
  };
}

/**
 * Give each diagnostic icon the theme style of its severity, unless the
 * flavor set an explicit color for it
 */
export function applyThemeDefaults(flavor: IconFlavor, theme: StyleProvider): IconFlavor {
  return {
    ...flavor,
    diagnostic: mapDiagnostics(flavor.diagnostic, (icon, severity) =>
      isExplicit(icon) ? icon : { ...icon, style: derived(theme.get(severity)) }
    )
  };
}

/**
 * Replace every icon style with the colorless derived style
 */
export function stripStyles(flavor: IconFlavor): IconFlavor {
  const strip = (icon: Icon): Icon => ({ glyph: icon.glyph, style: derived(EMPTY_STYLE) });
  return {
    ...flavor,
    mimeType: mapIcons(flavor.mimeType, strip),
    diagnostic: mapDiagnostics(flavor.diagnostic, strip),
    symbolKind: mapIcons(flavor.symbolKind, strip)
  };
}

/**
 * Convert and style a resolved icon flavor document
 *
 * @throws FlavorError of kind 'conversion'
 */
export function materializeIconFlavor(
  name: string,
  document: FlavorDocument,
  options: MaterializeOptions
): IconFlavor {
  const logger = options.logger ?? createSilentLogger();
  const themed = applyThemeDefaults(convertIconFlavor(name, document, logger), options.theme);

  // Must run after theme defaults so no 24-bit color reaches the terminal
  return options.supportsTrueColor ? themed : stripStyles(themed);
}
