/**
 * hydra logs - fetch one page of captured ingress requests
 */

import chalk from 'chalk';
import { Client, ReadyTimeoutError } from '@hydra/client';
import {
  after,
  before,
  DEFAULT_PAGE_LIMIT,
  directionSchema,
  noCursor,
  pageLimitSchema,
  type FetchIngressLogsRequest,
} from '@hydra/proto';
import { z } from 'zod';
import { ConfigManager, resolveClientConfig, type ClientFlags } from '../config.js';
import { formatIngressLogTable, formatPageFlags, pagingHints } from '../format.js';
import { diagnosticsLogger, nodeSocketFactory } from '../socket.js';

export interface LogsOptions extends ClientFlags {
  limit?: string;
  direction?: string;
  before?: string;
  after?: string;
  json?: boolean;
}

const pageOptionsSchema = z.object({
  limit: z.coerce.number().pipe(pageLimitSchema).default(DEFAULT_PAGE_LIMIT),
  direction: directionSchema.default('descending'),
});

/**
 * Turn command flags into a request. `--before`/`--after` take a key from a
 * previous page and are mutually exclusive.
 */
export function buildFetchRequest(options: LogsOptions): FetchIngressLogsRequest {
  if (options.before !== undefined && options.after !== undefined) {
    throw new Error('Cannot specify both --before and --after');
  }

  const parsed = pageOptionsSchema.safeParse({ limit: options.limit, direction: options.direction });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid options (${problems.join('; ')})`);
  }

  const cursor =
    options.before !== undefined ? before(options.before) : options.after !== undefined ? after(options.after) : noCursor;
  return { ...parsed.data, cursor };
}

export async function logsCommand(options: LogsOptions): Promise<void> {
  const { url, readyTimeoutMs } = resolveClientConfig(options, new ConfigManager().readOrDefault());
  const request = buildFetchRequest(options);

  const client = Client.new({
    url,
    socketFactory: nodeSocketFactory,
    logger: diagnosticsLogger(),
  });

  try {
    try {
      await client.ready({ timeoutMs: readyTimeoutMs });
    } catch (error) {
      if (error instanceof ReadyTimeoutError) {
        throw new Error(`Could not connect to ${url} within ${readyTimeoutMs}ms`, { cause: error });
      }
      throw error;
    }

    const page = await client.fetchIngressLogs(request);

    if (options.json) {
      console.log(JSON.stringify(page, null, 2));
      return;
    }

    console.log(formatIngressLogTable(page.items));
    const hints = pagingHints(page, request);
    if (hints.length > 0) console.log();
    for (const hint of hints) {
      const label = hint.label === 'previous' ? 'Previous' : 'Next';
      console.log(chalk.gray(`${label}: hydra logs ${formatPageFlags(hint.flags)}`));
    }
  } finally {
    client.close();
  }
}
