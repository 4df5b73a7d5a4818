// ============================================================================
// CARDLEAGUE - API Runtime Config
// ============================================================================

import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  LEAGUE_STATE_FILE: z.string().min(1).default('./data/league.json'),
  LEAGUE_SEED: z.string().min(1).default('cardleague'),
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
});

export interface ApiConfig {
  port: number;
  stateFile: string;
  seed: string;
  environment: 'development' | 'test' | 'production';
}

/**
 * Read API settings from the environment. Throws a ZodError naming every
 * bad variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ApiConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    stateFile: parsed.LEAGUE_STATE_FILE,
    seed: parsed.LEAGUE_SEED,
    environment: parsed.NODE_ENV,
  };
}
