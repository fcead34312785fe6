import { existsSync } from 'node:fs';
import chalk from 'chalk';
import { resolveConfig } from '../../config.js';
import { DiaryDatabase } from '../../storage/database.js';

export interface InitOptions {
  cwd?: string;
}

export function initCommand(opts: InitOptions = {}): void {
  const { dbPath } = resolveConfig({ cwd: opts.cwd });
  const existed = existsSync(dbPath);

  const db = new DiaryDatabase(dbPath);
  try {
    db.migrate();
    if (existed) {
      console.log(chalk.yellow(`${dbPath} already exists. Ensured diary tables.`));
    } else {
      console.log(chalk.green(`Initialized diary database at ${dbPath}`));
    }
    console.log(chalk.dim(`  Entries: ${db.countEntries()}`));
  } finally {
    db.close();
  }
}
