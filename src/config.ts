import { z } from 'zod';

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(4000),
    MONGO_URI: z.string().min(1).optional(),
    XP_STORE: z.enum(['mongo', 'memory']).default('mongo'),
    XP_STORE_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    XP_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
    XP_CONFLICT_RETRIES: z.coerce.number().int().min(0).default(5),
    XP_RECONCILE_INTERVAL_MS: z.coerce.number().int().min(0).default(60_000),
    XP_SESSION_IDLE_MS: z.coerce.number().int().min(0).default(60_000),
    LEADERBOARD_LIMIT: z.coerce.number().int().positive().default(50),
  })
  .refine((env) => env.XP_STORE === 'memory' || env.MONGO_URI, {
    message: 'MONGO_URI is required when XP_STORE=mongo',
    path: ['MONGO_URI'],
  });

export interface AppConfig {
  port: number;
  store: { driver: 'mongo'; mongoUri: string } | { driver: 'memory' };
  retry: { attempts: number; baseDelayMs: number };
  maxConflictRetries: number;
  reconcileIntervalMs: number;
  sessionIdleMs: number;
  leaderboardLimit: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    store:
      vars.XP_STORE === 'mongo' && vars.MONGO_URI
        ? { driver: 'mongo', mongoUri: vars.MONGO_URI }
        : { driver: 'memory' },
    retry: { attempts: vars.XP_STORE_ATTEMPTS, baseDelayMs: vars.XP_RETRY_BASE_DELAY_MS },
    maxConflictRetries: vars.XP_CONFLICT_RETRIES,
    reconcileIntervalMs: vars.XP_RECONCILE_INTERVAL_MS,
    sessionIdleMs: vars.XP_SESSION_IDLE_MS,
    leaderboardLimit: vars.LEADERBOARD_LIMIT,
  };
};
