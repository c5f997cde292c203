import { config } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_COMPLETION_TIMEOUT_MS } from './constants';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
  COMPLETION_PROVIDER: z.enum(['gemini', 'openai-compatible']).default('openai-compatible'),
  COMPLETION_MODEL: z.string().optional(),
  COMPLETION_TIMEOUT_MS: z.string().default(String(DEFAULT_COMPLETION_TIMEOUT_MS)).transform(Number),
  EXTRACTION_CONCURRENCY: z.string().default('2').transform(Number),
  GEMINI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default('http://localhost:11434/v1'),
  OPENAI_API_KEY: z.string().default('ollama'),
  REDIS_URL: z.string().optional(),
  PLAN_CACHE_TTL: z.string().default('604800').transform(Number),
  PLAN_STORE_DIR: z.string().default('data/processed'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
