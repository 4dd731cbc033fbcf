// Shared configuration

import { z } from 'zod';

// Custom Redis URL validator (redis:// URLs may not pass standard URL validation)
const redisUrl = z.string().refine(
  (val) => {
    try {
      const url = new URL(val);
      return url.protocol === 'redis:' || url.protocol === 'rediss:';
    } catch {
      return false;
    }
  },
  { message: 'Invalid Redis URL (expected redis:// or rediss://)' }
);

export const LagDirectionSchema = z.enum(['proxy-minus-rpc', 'rpc-minus-proxy']);
export type LagDirection = z.infer<typeof LagDirectionSchema>;

const ConfigSchema = z.object({
  // Redis (checkpoint store)
  REDIS_URL: redisUrl.default('redis://localhost:6379'),
  // How long startup waits for the first connection (ms)
  REDIS_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),

  // Topology file (networks, proxies, wallets, server groups)
  MONITOR_CONFIG_PATH: z.string().min(1).default('config.yaml'),

  // Prometheus exposition
  METRICS_PORT: z.coerce.number().int().positive().default(9000),

  // Round interval, also the per-round deadline (ms)
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),

  // RPC calls
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  RPC_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RPC_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),
  RPC_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  RATE_LIMIT_BACKOFF_MS: z.coerce.number().int().min(0).default(30000),

  // Signature discovery depth
  SIGNATURE_PAGE_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),
  SIGNATURE_MAX_PAGES: z.coerce.number().int().min(1).default(5),
  INITIAL_BACKFILL_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),

  // Node health: slots behind the group max still reported as healthy
  SLOT_DRIFT_THRESHOLD: z.coerce.number().int().min(1).default(10),

  LAG_DIRECTION: LagDirectionSchema.default('proxy-minus-rpc'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Config = z.infer<typeof ConfigSchema>;

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = ConfigSchema.parse(process.env);
  }
  return _config;
}

/** Parse an arbitrary environment without touching the cached config */
export function parseConfig(env: Record<string, string | undefined>): Config {
  return ConfigSchema.parse(env);
}
