import { z } from 'zod';
import { DEFAULT_RATIOS, DEFAULT_TABSTOP } from '@strata/protocol';

/**
 * Raised when the environment holds invalid settings
 */
export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback)
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Settings read from the environment (and `.env`)
 */
export const EnvSchema = z.object({
  STRATA_RATIOS: z
    .string()
    .default(DEFAULT_RATIOS.join(','))
    .transform((value) => value.split(',').map((part) => part.trim()))
    .pipe(z.array(z.coerce.number().int().positive()).min(1)),
  STRATA_TABSTOP: z.coerce.number().int().positive().default(DEFAULT_TABSTOP),
  STRATA_SHOWINFO: z.string().default('none'),
  STRATA_PREVIEW: flag('true'),
  STRATA_HIDDEN: flag('false'),
  STRATA_LOG_FILE: z.string().min(1).optional(),
  STRATA_KEYS: z
    .string()
    .transform((value, ctx): unknown => {
      try {
        return JSON.parse(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `not valid JSON (${error instanceof Error ? error.message : String(error)})`,
        });
        return z.NEVER;
      }
    })
    .pipe(z.record(z.string()))
    .optional(),
});

export interface AppConfig {
  ratios: number[];
  tabstop: number;
  showinfo: string;
  preview: boolean;
  hidden: boolean;
  logFile?: string;
  keys: Record<string, string>;
}

/**
 * Validate the environment into an AppConfig, reporting every bad value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  return {
    ratios: data.STRATA_RATIOS,
    tabstop: data.STRATA_TABSTOP,
    showinfo: data.STRATA_SHOWINFO,
    preview: data.STRATA_PREVIEW,
    hidden: data.STRATA_HIDDEN,
    ...(data.STRATA_LOG_FILE !== undefined && { logFile: data.STRATA_LOG_FILE }),
    keys: data.STRATA_KEYS ?? {},
  };
}
