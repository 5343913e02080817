import type { FetchIngressLogsRequest, FetchIngressLogsResponse, IngressLog, KeyedItem } from '@hydra/proto';

interface Column {
  header: string;
  value: (log: IngressLog) => string;
}

export function formatTarget(log: IngressLog): string {
  const search = new URLSearchParams(log.query).toString();
  return `/${log.path}${search ? `?${search}` : ''}`;
}

const COLUMNS: Column[] = [
  { header: 'EVENT ID', value: (log) => log.event_id },
  { header: 'DATE', value: (log) => log.date },
  { header: 'METHOD', value: (log) => log.method },
  { header: 'HOST', value: (log) => log.host },
  { header: 'TARGET', value: formatTarget },
  { header: 'FROM', value: (log) => log.remote_addr ?? '-' },
];

/**
 * Render a page of ingress logs as a plain-text table, one line per log,
 * columns separated by two spaces.
 */
export function formatIngressLogTable(items: KeyedItem<IngressLog>[]): string {
  if (items.length === 0) return 'No ingress logs captured yet.';

  const rows = items.map(({ item }) => COLUMNS.map((column) => column.value(item)));
  const widths = COLUMNS.map((column, index) =>
    Math.max(column.header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const line = (cells: string[]) =>
    cells
      .map((cell, index) => cell.padEnd(widths[index] ?? 0))
      .join('  ')
      .trimEnd();

  return [line(COLUMNS.map((column) => column.header)), ...rows.map(line)].join('\n');
}

/** `hydra logs` flags that select one page. */
export interface PageFlags {
  direction: string;
  limit: string;
  before?: string;
  after?: string;
}

export interface PagingHint {
  label: 'previous' | 'next';
  flags: PageFlags;
}

/**
 * Flags that fetch the neighbouring pages. Each hint repeats the direction
 * and limit of the request that produced the page, since `--before` and
 * `--after` are positions in that display order.
 */
export function pagingHints(page: FetchIngressLogsResponse, request: FetchIngressLogsRequest): PagingHint[] {
  const base = { direction: request.direction, limit: String(request.limit) };
  const hints: PagingHint[] = [];
  const first = page.items[0];
  const last = page.items[page.items.length - 1];
  if (page.has_more_before && first) hints.push({ label: 'previous', flags: { ...base, before: first.key } });
  if (page.has_more_after && last) hints.push({ label: 'next', flags: { ...base, after: last.key } });
  return hints;
}

export function formatPageFlags(flags: PageFlags): string {
  const parts = [`--direction ${flags.direction}`, `--limit ${flags.limit}`];
  if (flags.before !== undefined) parts.push(`--before ${flags.before}`);
  if (flags.after !== undefined) parts.push(`--after ${flags.after}`);
  return parts.join(' ');
}
