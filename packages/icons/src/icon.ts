/**
 * Icon model
 */

import type { Style } from '@tinct/theme';

/**
 * Where an icon's style came from
 *
 * - explicit: a color written in the flavor document; never replaced by a
 *   derived style
 * - derived: computed from the theme; may be refreshed by a later derived style
 */
export type StyleSource =
  | { readonly kind: 'explicit'; readonly style: Style }
  | { readonly kind: 'derived'; readonly style: Style };

export type Icon = {
  readonly glyph: string;
  readonly style?: StyleSource;
};

export const DIAGNOSTIC_SEVERITIES = ['error', 'warning', 'info', 'hint'] as const;

export type DiagnosticSeverity = (typeof DIAGNOSTIC_SEVERITIES)[number];

export type DiagnosticIcons = Readonly<Record<DiagnosticSeverity, Icon>>;

export type IconFlavor = {
  readonly name: string;
  readonly mimeType: Readonly<Record<string, Icon>>;
  readonly diagnostic: DiagnosticIcons;
  readonly symbolKind: Readonly<Record<string, Icon>>;
};

export const explicit = (style: Style): StyleSource => ({ kind: 'explicit', style });

export const derived = (style: Style): StyleSource => ({ kind: 'derived', style });

export function isExplicit(icon: Icon): boolean {
  return icon.style?.kind === 'explicit';
}
