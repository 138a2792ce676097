import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8081),
  // File path or http(s) URL of the inventory loaded at startup
  LISTINGS_SOURCE: z.string().min(1).default('data/sample_listings.json'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

const env = loadEnv();

export default env;
