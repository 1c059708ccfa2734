/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { config } from 'dotenv';
import { CABLE_CONFIG, CONNECTION_TIMING } from './constants.js';

/**
 * Schema for environment variables validation.
 */
export const EnvSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  /**
   * Path the WebSocket upgrade is accepted on.
   */
  CABLE_PATH: z.string().startsWith('/').default(CABLE_CONFIG.PATH),

  /**
   * Path of the loopback-only broadcast trigger.
   */
  BROADCAST_PATH: z.string().startsWith('/').default(CABLE_CONFIG.BROADCAST_PATH),

  /**
   * Read deadline per frame. A silent connection is dropped after this long.
   */
  READ_TIMEOUT_MS: z.coerce.number().int().positive().default(CONNECTION_TIMING.READ_TIMEOUT_MS),

  /**
   * Interval for server-initiated `{"type":"ping"}` envelopes. 0 disables them.
   */
  PING_INTERVAL_MS: z.coerce.number().int().min(0).default(CONNECTION_TIMING.PING_INTERVAL_MS),

  /**
   * Largest client message accepted, in bytes.
   */
  MAX_MESSAGE_BYTES: z.coerce.number().int().positive().default(CABLE_CONFIG.MAX_MESSAGE_BYTES),

  /**
   * Where producers post broadcasts. Defaults to this server's own trigger.
   * Example: "http://localhost:3000/_broadcast"
   */
  CABLE_BROADCAST_URL: z.string().url().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Loads and validates environment variables.
 * Exits the process if validation fails.
 */
export function loadEnv(): Env {
  // Load environment variables from .env files
  config({ path: '.env.local' });
  config({ path: '.env' });

  const result = EnvSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

/**
 * Resolves the URL a producer posts broadcasts to.
 */
export function resolveBroadcastUrl(
  env: Pick<Env, 'CABLE_BROADCAST_URL' | 'PORT' | 'BROADCAST_PATH'>
): string {
  if (env.CABLE_BROADCAST_URL) {
    return env.CABLE_BROADCAST_URL;
  }
  return `http://localhost:${env.PORT}${env.BROADCAST_PATH}`;
}

// Singleton env instance
let envInstance: Env | null = null;

/**
 * Gets the environment configuration singleton.
 */
export function getEnv(): Env {
  envInstance ??= loadEnv();
  return envInstance;
}
