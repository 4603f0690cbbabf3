/* src/cli/config/schema.ts
 * Zod schemas for wfmon.config.* and the environment overrides.
 */
import { z } from 'zod';

// Boolean-ish values: true/false, 1/0, "yes"/"no".
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v, ctx) => {
    if (typeof v === 'boolean') return v;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true' || s === 'yes' || s === 'on') return true;
    if (s === '0' || s === 'false' || s === 'no' || s === 'off') return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected a boolean (true/false/1/0), got "${String(v)}"`,
    });
    return z.NEVER;
  });

const nonEmpty = z.string().trim().min(1);

export const fileConfigSchema = z
  .object({
    interval: z.number().int().positive().optional(),
    notify: coerceBool.optional(),
    stateDir: nonEmpty.optional(),
    barWidth: z.number().int().min(10).max(200).optional(),
    recentLines: z.number().int().min(1).max(50).optional(),
    startupRetries: z.number().int().min(0).max(20).optional(),
    startupRetryDelayMs: z.number().int().nonnegative().optional(),
    commandTimeoutMs: z.number().int().positive().optional(),
    engines: z
      .object({
        snakemake: z.object({ log: nonEmpty.optional() }).strict().optional(),
        nextflow: z.object({ log: nonEmpty.optional() }).strict().optional(),
        wdl: z.object({ dir: nonEmpty.optional() }).strict().optional(),
        slurm: z.object({ user: nonEmpty.optional() }).strict().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export const envSchema = z.object({
  UPDATE_INTERVAL: z.coerce.number().int().positive().optional(),
  ENABLE_NOTIFICATIONS: coerceBool.optional(),
  WFMON_STATE_DIR: nonEmpty.optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;
