import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../services/dispatch/cancellation-scope.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default('*'),
  GATEWAY_CONFIG_PATH: z.string().min(1).default('config/gateway.config.json'),
  /** `team=key` pairs, comma separated. Empty means no authentication. */
  GATEWAY_API_KEYS: z.string().default(''),
  /** 0 disables the timeout. */
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().nonnegative().max(MAX_TIMEOUT_MS).default(120_000),
  EMBEDDING_CHUNK_SIZE: z.coerce.number().int().positive().default(96),
  EMBEDDING_MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
  STREAM_BUFFER_SIZE: z.coerce.number().int().positive().default(16),
  /** Serves Prometheus metrics on GET /metrics when `true`. */
  METRICS_ENABLED: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export type GatewayEnv = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): GatewayEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`invalid environment: ${details.join('; ')}`);
  }
  return parsed.data;
}
