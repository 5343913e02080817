/**
 * Server configuration read from the environment.
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_PORT = 9797;
export const DEFAULT_HOST = '0.0.0.0';

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
}

const envSchema = z.object({
  HYDRA_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  HYDRA_HOST: z.string().min(1).optional(),
  HYDRA_DATA_DIR: z.string().min(1).optional(),
});

export function defaultDataDir(): string {
  return join(homedir(), '.hydra');
}

/**
 * Build a ServerConfig from environment variables, falling back to defaults.
 * Throws ConfigError naming every invalid variable.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse({
    HYDRA_PORT: env.HYDRA_PORT || undefined,
    HYDRA_HOST: env.HYDRA_HOST || undefined,
    HYDRA_DATA_DIR: env.HYDRA_DATA_DIR || undefined,
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid server configuration (${problems.join('; ')})`);
  }

  return {
    port: parsed.data.HYDRA_PORT ?? DEFAULT_PORT,
    host: parsed.data.HYDRA_HOST ?? DEFAULT_HOST,
    dataDir: parsed.data.HYDRA_DATA_DIR ?? defaultDataDir(),
  };
}
