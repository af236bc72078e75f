import path from 'node:path';
import type { CalendarDate } from '../../shared/types';

export const ORIGINAL_DIR = 'Original';
export const REWRITTEN_DIR = 'Rewritten';
export const PUBLISHED_DIR = 'Published';

export const originalDir = (root: string, date: CalendarDate, site: string): string =>
  path.join(root, date, site, ORIGINAL_DIR);

export const rewrittenDir = (root: string, date: CalendarDate, site: string): string =>
  path.join(root, date, site, REWRITTEN_DIR);

export const publishedDir = (root: string, date: CalendarDate): string => path.join(root, PUBLISHED_DIR, date);

export const manifestFilename = (site: string, date: CalendarDate): string => `${site}_urls_${date}.json`;

/** `.../<site>/Original/<name>.txt` → `.../<site>/Rewritten/<name>.txt` */
export const rewrittenPathFor = (originalPath: string): string => {
  const dir = path.dirname(originalPath);
  const stem = path.basename(originalPath, path.extname(originalPath));
  if (path.basename(dir) === ORIGINAL_DIR) {
    return path.join(path.dirname(dir), REWRITTEN_DIR, `${stem}.txt`);
  }
  return `${originalPath}.rewritten.txt`;
};

export const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to write outside of archive root: ${target}`);
  }
};
