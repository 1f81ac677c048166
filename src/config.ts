import { z } from 'zod';
import { ConfigError } from './errors.js';

export const GeneratorConfigSchema = z.object({
  /** Extra ids tried after an IdCollisionError before giving up */
  maxCollisionRetries: z.number().int().min(0).max(1000).default(16),
  /** Obscure keycode bodies; the target devices must expect it */
  obscure: z.boolean().default(false),
});

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;

export function parseGeneratorConfig(input: GeneratorConfigInput = {}): GeneratorConfig {
  const result = GeneratorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid generator config: ${result.error.message}`, {
      issues: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }
  return result.data;
}

const EnvSchema = z.object({
  KEYCODE_MAX_COLLISION_RETRIES: z.coerce.number().int().optional(),
  KEYCODE_OBSCURE: z.enum(['true', 'false', '1', '0']).optional(),
});

/**
 * Generator config from environment variables:
 * KEYCODE_MAX_COLLISION_RETRIES and KEYCODE_OBSCURE.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
  const result = EnvSchema.safeParse({
    KEYCODE_MAX_COLLISION_RETRIES: env.KEYCODE_MAX_COLLISION_RETRIES || undefined,
    KEYCODE_OBSCURE: env.KEYCODE_OBSCURE || undefined,
  });
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${result.error.message}`, {
      issues: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  const { KEYCODE_MAX_COLLISION_RETRIES, KEYCODE_OBSCURE } = result.data;
  return parseGeneratorConfig({
    maxCollisionRetries: KEYCODE_MAX_COLLISION_RETRIES,
    obscure: KEYCODE_OBSCURE === undefined ? undefined : KEYCODE_OBSCURE === 'true' || KEYCODE_OBSCURE === '1',
  });
}
