import { basename } from 'node:path';
import chalk from 'chalk';
import { resolveConfig } from '../../config.js';
import { importDirectory, type ImportSummary } from '../../importer/directory.js';
import { openDiary } from '../open.js';

export interface ImportCommandOptions {
  cwd?: string;
  timeZone?: string;
  disambiguation?: string;
  verbose?: boolean;
}

export function importCommand(opts: ImportCommandOptions = {}): ImportSummary {
  const config = resolveConfig({
    cwd: opts.cwd,
    timeZone: opts.timeZone,
    disambiguation: opts.disambiguation,
  });

  const db = openDiary(config.dbPath);
  try {
    const summary = importDirectory(config.inputDir, db, {
      timeZone: config.timeZone,
      disambiguation: config.disambiguation,
      onEntry: opts.verbose
        ? entry => console.log(chalk.dim(`  ${basename(entry.filePath)} → ${entry.date} (#${entry.id})`))
        : undefined,
    });

    const n = summary.entries.length;
    console.log(chalk.green(`Imported ${n} ${n === 1 ? 'entry' : 'entries'} from ${summary.directory}`));
    return summary;
  } finally {
    db.close();
  }
}
