import fs from 'node:fs/promises';
import path from 'node:path';
import type { CalendarDate } from '../../shared/types';
import type { Logger } from '../obs/logger';
import { isCalendarDate, subtractDays, todayIso } from '../scraping/dates';
import { PUBLISHED_DIR } from './layout';

export interface SweepOptions {
  rootDir: string;
  retentionDays: number;
  today?: CalendarDate;
  logger?: Logger;
}

const listDirectories = async (dir: string): Promise<string[]> => {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
};

/**
 * Removes `<root>/<date>` and `<root>/Published/<date>` directories dated before
 * `today - retentionDays`. Directories whose names are not ISO dates are left alone.
 */
export const sweepArchive = async (options: SweepOptions): Promise<string[]> => {
  const root = path.resolve(options.rootDir);
  const cutoff = subtractDays(options.today ?? todayIso(), options.retentionDays);
  const deleted: string[] = [];

  for (const base of [root, path.join(root, PUBLISHED_DIR)]) {
    for (const name of await listDirectories(base)) {
      if (!isCalendarDate(name) || name >= cutoff) continue;
      const target = path.join(base, name);
      await fs.rm(target, { recursive: true, force: true });
      deleted.push(target);
    }
  }

  if (deleted.length > 0) {
    options.logger?.info('Removed expired archive folders', { count: deleted.length, retentionDays: options.retentionDays });
  }
  return deleted;
};
