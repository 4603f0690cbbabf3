// src/cli/version.ts
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

const pkgSchema = z.object({ name: z.string(), version: z.string() });

export const readPackageInfo = (): z.infer<typeof pkgSchema> =>
  pkgSchema.parse(
    JSON.parse(
      readFileSync(fileURLToPath(new URL('../../package.json', import.meta.url)), 'utf8'),
    ),
  );
