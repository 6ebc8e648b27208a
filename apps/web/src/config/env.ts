import { z } from 'zod';

// Largest delay setInterval honours; anything above fires after 1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

const envSchema = z.object({
  // Authentication Service / Resource API
  VITE_API_URL: z.string().default('/api'),

  // Session persistence
  VITE_AUTH_TOKEN_KEY: z.string().min(1).default('jwt_token'),
  VITE_AUTH_USER_KEY: z.string().min(1).default('user_info'),
  VITE_AUTH_CHECK_INTERVAL_MS: z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(60_000),
  VITE_AUTH_BUFFER_WINDOW_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),

  // Logging
  VITE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export type EnvSource = Record<string, unknown>;

// Vite and Vitest provide `import.meta.env`; plain Node leaves it undefined.
export function readRuntimeEnv(): EnvSource {
  return import.meta.env ?? {};
}

export function loadEnv(source: EnvSource = readRuntimeEnv()): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.flatten().fieldErrors);
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const env = loadEnv();

export const sessionOptionsSchema = z.object({
  tokenKey: z.string().min(1).default(env.VITE_AUTH_TOKEN_KEY),
  userKey: z.string().min(1).default(env.VITE_AUTH_USER_KEY),
  checkInterval: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMER_DELAY_MS, 'checkInterval must not exceed 2147483647 ms')
    .default(env.VITE_AUTH_CHECK_INTERVAL_MS),
  bufferWindow: z.number().int().nonnegative().default(env.VITE_AUTH_BUFFER_WINDOW_MS),
});

export type SessionOptions = z.infer<typeof sessionOptionsSchema>;
