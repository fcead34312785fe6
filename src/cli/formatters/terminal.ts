import chalk from 'chalk';
import type { MonthGroup, SearchHit, StoredEntry, YearCount } from '../../model/entry.js';
import { formatUtcTimestamp } from '../../time/date-format.js';
import { shortBodyHash } from '../../utils/hash.js';

const PREVIEW_WIDTH = 60;

export function preview(body: string, width = PREVIEW_WIDTH): string {
  const line = body.split('\n').map(l => l.trim()).find(l => l.length > 0) ?? '';
  return line.length > width ? `${line.slice(0, width - 1)}…` : line;
}

function plural(n: number, one: string, many: string): string {
  return `${n} ${n === 1 ? one : many}`;
}

export function formatEntryList(entries: StoredEntry[]): string {
  if (entries.length === 0) {
    return chalk.dim('No entries.');
  }

  return entries
    .map(e => `${chalk.bold(e.date)}  ${chalk.dim(`#${e.id}`.padEnd(6))} ${preview(e.body)}`)
    .join('\n');
}

export function formatYearCounts(counts: YearCount[]): string {
  if (counts.length === 0) {
    return chalk.dim('No entries.');
  }

  const lines = counts.map(c => `  ${chalk.bold(String(c.year))}  ${plural(c.count, 'entry', 'entries')}`);
  const total = counts.reduce((sum, c) => sum + c.count, 0);
  lines.push(chalk.dim(`\n  ${plural(total, 'entry', 'entries')} in ${plural(counts.length, 'year', 'years')}`));
  return lines.join('\n');
}

export function formatYear(year: number, months: MonthGroup[]): string {
  if (months.length === 0) {
    return chalk.dim(`No entries in ${year}.`);
  }

  const total = months.reduce((sum, m) => sum + m.entries.length, 0);
  const lines = [`${chalk.bold(String(year))}${chalk.dim(` · ${plural(total, 'entry', 'entries')}`)}`];
  for (const m of months) {
    lines.push('', chalk.bold(m.name));
    for (const e of m.entries) {
      lines.push(`  ${e.date}  ${chalk.dim(`#${e.id}`.padEnd(6))} ${preview(e.body)}`);
    }
  }
  return lines.join('\n');
}

export function formatSearchHits(query: string, hits: SearchHit[]): string {
  if (hits.length === 0) {
    return chalk.dim(`No entries match "${query}".`);
  }

  const lines = hits.map(h => `${chalk.bold(h.date)}  ${chalk.dim(`#${h.id}`.padEnd(6))} ${h.snippet.replace(/\s+/g, ' ').trim()}`);
  lines.push(chalk.dim(`\n${plural(hits.length, 'result', 'results')}`));
  return lines.join('\n');
}

export function formatEntry(entry: StoredEntry): string {
  const meta = [`#${entry.id}`, formatUtcTimestamp(entry.timestamp), `sha256 ${shortBodyHash(entry.body)}`];
  return [
    chalk.bold(entry.date),
    chalk.dim(meta.join(' · ')),
    '',
    entry.body,
  ].join('\n');
}
