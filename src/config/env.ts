import { z } from 'zod';

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  TOOLEVAL_DEFAULT_MODEL: z.string().default('claude-sonnet-4-20250514'),
  TOOLEVAL_CONCURRENCY: z.coerce.number().int().min(1).max(20).default(1),
  TOOLEVAL_MAX_TOKENS: z.coerce.number().int().min(64).max(32000).default(1024),
  TOOLEVAL_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600_000).default(60_000),
  TOOLEVAL_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  TOOLEVAL_RESULTS_DIR: z.string().default('.tooleval/results'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}
