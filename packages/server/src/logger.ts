/**
 * Structured logger shared by the server and the CLI.
 * JSON lines by default, pretty-printed on a TTY or with LOG_FORMAT=pretty.
 * Where lines go is pluggable per logger and inherited by children.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',   // gray
  info:  '\x1b[36m',   // cyan
  warn:  '\x1b[33m',   // yellow
  error: '\x1b[31m',   // red
};
const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

export type LogContext = Record<string, unknown>;

export function formatPretty(level: LogLevel, scope: string, msg: string, ctx?: LogContext, now = new Date()): string {
  const ts = now.toISOString().slice(11, 23); // HH:MM:SS.mmm
  const color = LEVEL_COLORS[level];
  const lvl = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? `${BOLD}[${scope}]${RESET} ` : '';
  let line = `${color}${ts} ${lvl}${RESET} ${scopeStr}${msg}`;
  if (ctx && Object.keys(ctx).length > 0) {
    const parts = Object.entries(ctx).map(([k, v]) => {
      const val = typeof v === 'string' ? v : JSON.stringify(v);
      return `${k}=${val}`;
    });
    line += ` ${color}(${parts.join(', ')})${RESET}`;
  }
  return line;
}

export function formatJson(level: LogLevel, scope: string, msg: string, ctx?: LogContext, now = new Date()): string {
  return JSON.stringify({
    ts: now.toISOString(),
    level,
    scope,
    msg,
    ...ctx,
  });
}

export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  child(childScope: string): Logger;
}

export type LogFormat = 'json' | 'pretty';

/** Receives each formatted line that passes the level threshold. */
export type LogOutput = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  output?: LogOutput;
}

/** Errors to stderr, everything else to stdout. */
export const standardOutput: LogOutput = (level, line) => {
  if (level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
};

/** Every level to stderr, for commands whose stdout is their result. */
export const stderrOutput: LogOutput = (_level, line) => {
  process.stderr.write(line + '\n');
};

/**
 * Threshold and format from LOG_LEVEL / LOG_FORMAT. An unknown level falls
 * back to info; without LOG_FORMAT a TTY gets pretty output.
 */
export function logSettingsFromEnv(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdout.isTTY)) {
  const envLevel = env.LOG_LEVEL;
  const level: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
  const format: LogFormat = env.LOG_FORMAT === 'pretty' || (isTTY && env.LOG_FORMAT !== 'json') ? 'pretty' : 'json';
  return { level, format };
}

const defaults = logSettingsFromEnv();

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? defaults.level;
  const format = options.format ?? defaults.format;
  const output = options.output ?? standardOutput;

  const write = (level: LogLevel, msg: string, ctx?: LogContext) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const line = format === 'pretty' ? formatPretty(level, scope, msg, ctx) : formatJson(level, scope, msg, ctx);
    output(level, line);
  };

  return {
    debug: (msg, ctx) => write('debug', msg, ctx),
    info:  (msg, ctx) => write('info', msg, ctx),
    warn:  (msg, ctx) => write('warn', msg, ctx),
    error: (msg, ctx) => write('error', msg, ctx),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level: minLevel, format, output }),
  };
}

export function errorContext(error: unknown): LogContext {
  if (error instanceof Error) {
    return { error: error.message, name: error.name };
  }
  return { error: String(error) };
}

// Root logger
export const logger = createLogger('hydra');
