#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { initCommand } from '../src/cli/commands/init.js';
import { importCommand } from '../src/cli/commands/import.js';
import { recentCommand, DEFAULT_RECENT_COUNT } from '../src/cli/commands/recent.js';
import { yearsCommand } from '../src/cli/commands/years.js';
import { yearCommand } from '../src/cli/commands/year.js';
import { newCommand } from '../src/cli/commands/new.js';
import { searchCommand } from '../src/cli/commands/search.js';
import { showCommand } from '../src/cli/commands/show.js';
import { isDiaryError } from '../src/errors.js';
import type { OutputFormat } from '../src/cli/open.js';

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return n;
}

function parseFormat(value: string): OutputFormat {
  if (value !== 'terminal' && value !== 'json') {
    throw new InvalidArgumentError('Expected "terminal" or "json".');
  }
  return value;
}

function run(action: () => unknown): void {
  try {
    action();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${message}`));
    if (!isDiaryError(err) && err instanceof Error && process.env.DIARY_DEBUG) {
      console.error(chalk.dim(err.stack ?? ''));
    }
    process.exit(1);
  }
}

const program = new Command();

program
  .name('diary')
  .description('Import dated diary entry files into a SQLite diary and read them back')
  .version('0.1.0');

program
  .command('init')
  .description('Create the diary tables in ./diary.sqlite3')
  .action(() => {
    run(() => initCommand());
  });

program
  .command('import')
  .description('Import every file in ./docs named year-month-day-hour-minute')
  .option('-t, --timezone <zone>', 'IANA time zone the file names are written in (default: $DIARY_TIMEZONE or America/Vancouver)')
  .option('--disambiguation <mode>', 'DST gap/overlap handling: compatible, earlier, later or reject')
  .option('-v, --verbose', 'Print each imported file')
  .action((opts: { timezone?: string; disambiguation?: string; verbose?: boolean }) => {
    run(() => importCommand({
      timeZone: opts.timezone,
      disambiguation: opts.disambiguation,
      verbose: opts.verbose,
    }));
  });

program
  .command('recent')
  .description('Show the newest entries')
  .option('-n, --count <n>', 'Number of entries to show', parseInteger, DEFAULT_RECENT_COUNT)
  .option('-f, --format <format>', 'Output format: terminal or json', parseFormat, 'terminal')
  .action((opts: { count: number; format: OutputFormat }) => {
    run(() => recentCommand({ count: opts.count, format: opts.format }));
  });

program
  .command('years')
  .description('Count entries per year')
  .option('-f, --format <format>', 'Output format: terminal or json', parseFormat, 'terminal')
  .action((opts: { format: OutputFormat }) => {
    run(() => yearsCommand({ format: opts.format }));
  });

program
  .command('year <year>')
  .description("List one year's entries by month")
  .option('-f, --format <format>', 'Output format: terminal or json', parseFormat, 'terminal')
  .action((year: string, opts: { format: OutputFormat }) => {
    run(() => yearCommand(parseInteger(year), { format: opts.format }));
  });

program
  .command('new <body>')
  .description('Add an entry dated now')
  .option('-t, --timezone <zone>', 'IANA time zone for the entry date (default: $DIARY_TIMEZONE or America/Vancouver)')
  .action((body: string, opts: { timezone?: string }) => {
    run(() => newCommand(body, { timeZone: opts.timezone }));
  });

program
  .command('search <query>')
  .description('Full-text search over entry bodies')
  .option('-f, --format <format>', 'Output format: terminal or json', parseFormat, 'terminal')
  .action((query: string, opts: { format: OutputFormat }) => {
    run(() => searchCommand(query, { format: opts.format }));
  });

program
  .command('show <id>')
  .description('Show one entry by id')
  .option('-f, --format <format>', 'Output format: terminal or json', parseFormat, 'terminal')
  .action((id: string, opts: { format: OutputFormat }) => {
    run(() => showCommand(parseInteger(id), { format: opts.format }));
  });

program.parse();
