/**
 * Icon flavor document schema
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';

/**
 * A glyph is exactly one Unicode code point
 */
const GlyphSchema = z
  .string()
  .refine((value) => [...value].length === 1, { message: 'icon must be a single character' });

export const IconEntrySchema = z
  .object({
    icon: GlyphSchema.describe('Glyph shown for the entry'),
    color: z.string().optional().describe('Foreground color as #RRGGBB')
  })
  .strict();

export const DiagnosticEntriesSchema = z
  .object({
    error: IconEntrySchema,
    warning: IconEntrySchema,
    info: IconEntrySchema,
    hint: IconEntrySchema
  })
  .strict();

export const IconFlavorDocumentSchema = z
  .object({
    // Consumed by the resolver; carries no meaning here
    inherits: z.string().optional(),
    'mime-type': z
      .record(IconEntrySchema)
      .optional()
      .default({})
      .describe('Icons keyed by file extension or whole file name'),
    diagnostic: DiagnosticEntriesSchema.describe('Icons per diagnostic severity'),
    'symbol-kind': z
      .record(IconEntrySchema)
      .optional()
      .default({})
      .describe('Icons keyed by LSP symbol kind')
  })
  .strict();

export type IconEntry = z.infer<typeof IconEntrySchema>;
export type IconFlavorDocument = z.infer<typeof IconFlavorDocumentSchema>;

/**
 * Format validation issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
