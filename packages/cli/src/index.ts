/**
 * tinct CLI - Inspect icon flavors and themes
 */

import { readFileSync } from 'node:fs';
import { errorMessage } from '@tinct/core';
import { z } from 'zod';
import { createProgram } from './program.js';

const PackageJsonSchema = z.object({ version: z.string() });

const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);

createProgram({ version: packageJson.version })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  });
