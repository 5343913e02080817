/**
 * Configuration file reader/writer for hydra.config.json, plus the
 * flag > environment > file > default resolution used by the commands.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_URL } from '@hydra/client';
import { ConfigError, DEFAULT_HOST, DEFAULT_PORT, defaultDataDir, type ServerConfig } from '@hydra/server';
import { z, type ZodError } from 'zod';

export const CONFIG_FILENAME = 'hydra.config.json';
export const DEFAULT_READY_TIMEOUT_MS = 10_000;

const portSchema = z.coerce.number().int().min(0).max(65535);
const timeoutSchema = z.coerce.number().int().positive();

export const configFileSchema = z
  .object({
    server: z
      .object({
        port: portSchema.optional(),
        host: z.string().min(1).optional(),
        dataDir: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    client: z
      .object({
        url: z.string().url().optional(),
        readyTimeoutMs: timeoutSchema.optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type HydraConfig = z.infer<typeof configFileSchema>;

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export class ConfigManager {
  private configPath: string;

  constructor(projectRoot: string = process.cwd()) {
    this.configPath = join(projectRoot, CONFIG_FILENAME);
  }

  get path(): string {
    return this.configPath;
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  read(): HydraConfig {
    if (!this.exists()) {
      throw new ConfigError(`${CONFIG_FILENAME} not found. Run 'hydra init' to create one.`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILENAME}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid ${CONFIG_FILENAME} (${describeIssues(parsed.error)})`);
    }
    return parsed.data;
  }

  /** The file's contents, or an empty config when there is no file. */
  readOrDefault(): HydraConfig {
    return this.exists() ? this.read() : configFileSchema.parse({});
  }

  write(config: HydraConfig): void {
    try {
      writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
    } catch (error) {
      throw new ConfigError(
        `Failed to write ${CONFIG_FILENAME}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  init(options: { force?: boolean } = {}): HydraConfig {
    if (this.exists() && !options.force) {
      throw new ConfigError(`${CONFIG_FILENAME} already exists`);
    }

    const config: HydraConfig = {
      server: { port: DEFAULT_PORT, host: DEFAULT_HOST, dataDir: defaultDataDir() },
      client: { url: DEFAULT_URL, readyTimeoutMs: DEFAULT_READY_TIMEOUT_MS },
    };

    this.write(config);
    return config;
  }
}

// Empty strings count as unset, as in the server's own env handling
function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  return env[name] || undefined;
}

export interface ServeFlags {
  port?: string;
  host?: string;
  dataDir?: string;
}

const serveSchema = z.object({
  port: portSchema,
  host: z.string().min(1),
  dataDir: z.string().min(1),
});

export function resolveServeConfig(
  flags: ServeFlags,
  file: HydraConfig,
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const parsed = serveSchema.safeParse({
    port: flags.port ?? fromEnv(env, 'HYDRA_PORT') ?? file.server.port ?? DEFAULT_PORT,
    host: flags.host ?? fromEnv(env, 'HYDRA_HOST') ?? file.server.host ?? DEFAULT_HOST,
    dataDir: flags.dataDir ?? fromEnv(env, 'HYDRA_DATA_DIR') ?? file.server.dataDir ?? defaultDataDir(),
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid serve configuration (${describeIssues(parsed.error)})`);
  }
  return parsed.data;
}

export interface ClientFlags {
  url?: string;
  timeout?: string;
}

export interface ClientConfig {
  url: string;
  readyTimeoutMs: number;
}

const clientSchema = z.object({
  url: z.string().url(),
  readyTimeoutMs: timeoutSchema,
});

export function resolveClientConfig(
  flags: ClientFlags,
  file: HydraConfig,
  env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
  const parsed = clientSchema.safeParse({
    url: flags.url ?? fromEnv(env, 'HYDRA_URL') ?? file.client.url ?? DEFAULT_URL,
    readyTimeoutMs: flags.timeout ?? file.client.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS,
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid client configuration (${describeIssues(parsed.error)})`);
  }
  return parsed.data;
}
