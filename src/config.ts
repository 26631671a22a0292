/**
 * Configuration validation
 *
 * Merges caller options over DEFAULT_CONFIG and checks them before the
 * loop starts. Checks run in a fixed order and only the first failure is
 * reported.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_CONFIG, type WeaselConfig } from './types.js';

const mutationRateMessage = (value: unknown) =>
  `Mutation value should be within [1-100], not ${String(value)}`;
const iterationsMessage = (value: unknown) => `Iterations value should be >= 1, not ${String(value)}`;

const WeaselConfigSchema = z.object({
  phrase: z.string({ required_error: 'Phrase must be a non-empty string' }).min(1, {
    message: 'Phrase must be a non-empty string',
  }),
  mutationRate: z
    .number({ errorMap: (_issue, ctx) => ({ message: mutationRateMessage(ctx.data) }) })
    .refine(
      (value) => Number.isInteger(value) && value >= 1 && value <= 100,
      (value) => ({ message: mutationRateMessage(value) })
    ),
  iterations: z
    .number({ errorMap: (_issue, ctx) => ({ message: iterationsMessage(ctx.data) }) })
    .refine(
      (value) => Number.isInteger(value) && value >= 1,
      (value) => ({ message: iterationsMessage(value) })
    ),
  charSet: z.string(),
  seed: z.string().nullable(),
});

export type WeaselOptions = Partial<WeaselConfig>;

export type ConfigResult =
  | { ok: true; config: Readonly<WeaselConfig> }
  | { ok: false; error: ConfigurationError };

export function validateConfig(options: WeaselOptions): ConfigResult {
  // An explicit undefined leaves the default in place
  const given = Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
  const parsed = WeaselConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...given });

  if (parsed.success) {
    return { ok: true, config: Object.freeze(parsed.data) };
  }

  const issue = parsed.error.issues[0];
  const field = issue?.path.join('.');
  return {
    ok: false,
    error: new ConfigurationError(issue?.message ?? 'Invalid configuration', field, {
      issues: parsed.error.issues.map((i) => i.message),
    }),
  };
}

/**
 * Same as validateConfig, throwing the ConfigurationError instead
 */
export function resolveConfig(options: WeaselOptions): Readonly<WeaselConfig> {
  const result = validateConfig(options);
  if (!result.ok) {
    throw result.error;
  }
  return result.config;
}
