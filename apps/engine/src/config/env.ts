import { z } from 'zod';

const intervalMs = z.coerce.number().int().positive();

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  PG_POOL_MAX: z.coerce.number().int().positive().default(10),
  REVALIDATION_SWEEP_INTERVAL_MS: intervalMs.default(60_000),
  ATTENTION_SWEEP_INTERVAL_MS: intervalMs.default(60_000),
  STALE_VEHICLE_SWEEP_INTERVAL_MS: intervalMs.default(5 * 60_000),
  SWEEP_BATCH_SIZE: z.coerce.number().int().positive().max(1_000).default(100),
});

export type EngineEnv = z.infer<typeof envSchema>;

/** Throws a ZodError naming every invalid variable. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EngineEnv {
  return envSchema.parse(source);
}
