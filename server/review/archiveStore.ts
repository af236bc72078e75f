import fs from 'node:fs/promises';
import path from 'node:path';
import { SITE_SLUGS, type SiteSlug } from '../../shared/config';
import type { ArchiveEntry, CalendarDate, MergedEntry, ReviewState } from '../../shared/types';
import { ArchiveError } from '../errors';
import { parseArticleText } from '../persistence/articleFile';
import { guardPath, originalDir, publishedDir, rewrittenDir, rewrittenPathFor } from '../persistence/layout';
import { isCalendarDate } from '../scraping/dates';

const isFile = async (target: string): Promise<boolean> => {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
};

const listTextFiles = async (dir: string): Promise<string[]> => {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.txt'))
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
};

export const listArchiveDates = async (root: string): Promise<CalendarDate[]> => {
  try {
    const entries = await fs.readdir(root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && isCalendarDate(entry.name))
      .map((entry) => entry.name)
      .sort()
      .reverse();
  } catch {
    return [];
  }
};

export interface EntryStatus {
  state: ReviewState;
  currentPath: string;
}

/**
 * Published wins over Rewritten, which wins over Original.
 */
export const articleStatus = async (root: string, date: CalendarDate, originalPath: string): Promise<EntryStatus> => {
  const rewritten = rewrittenPathFor(originalPath);
  const published = publishedDir(root, date);
  for (const name of new Set([path.basename(originalPath), path.basename(rewritten)])) {
    const candidate = path.join(published, name);
    if (await isFile(candidate)) {
      return { state: 'published', currentPath: candidate };
    }
  }
  if (await isFile(rewritten)) {
    return { state: 'rewritten', currentPath: rewritten };
  }
  return { state: 'original', currentPath: originalPath };
};

export const resolveOriginalPath = (root: string, date: CalendarDate, site: SiteSlug, filename: string): string => {
  if (filename !== path.basename(filename) || !filename.endsWith('.txt')) {
    throw new ArchiveError(`Invalid article filename: ${filename}`, { path: filename });
  }
  const target = path.join(originalDir(root, date, site), filename);
  guardPath(root, target);
  return target;
};

export const readEntry = async (root: string, date: CalendarDate, site: SiteSlug, filename: string): Promise<ArchiveEntry> => {
  const originalPath = resolveOriginalPath(root, date, site, filename);
  const parsed = parseArticleText(await fs.readFile(originalPath, 'utf-8'));
  const status = await articleStatus(root, date, originalPath);
  return {
    site,
    date,
    filename,
    title: parsed.title ?? filename,
    url: parsed.url,
    originalPath,
    state: status.state,
    currentPath: status.currentPath,
  };
};

/** Original articles for one day, across the requested sites, in site then filename order. */
export const listOriginals = async (
  root: string,
  date: CalendarDate,
  sites: readonly SiteSlug[] = SITE_SLUGS,
): Promise<ArchiveEntry[]> => {
  const entries: ArchiveEntry[] = [];
  for (const site of sites) {
    for (const filename of await listTextFiles(originalDir(root, date, site))) {
      entries.push(await readEntry(root, date, site, filename));
    }
  }
  return entries;
};

export const readCurrentText = async (entry: Pick<ArchiveEntry, 'currentPath'>): Promise<string> =>
  fs.readFile(entry.currentPath, 'utf-8');

const moveFile = async (from: string, to: string) => {
  await fs.mkdir(path.dirname(to), { recursive: true });
  await fs.rename(from, to);
};

/**
 * Rewritten → Published/<date>, or Published → back to Rewritten. Originals that have not been
 * rewritten cannot be published.
 */
export const togglePublish = async (root: string, entry: ArchiveEntry): Promise<ArchiveEntry> => {
  if (entry.state === 'original') {
    throw new ArchiveError(`"${entry.title}" has not been rewritten yet`, { path: entry.originalPath });
  }
  if (entry.state === 'rewritten') {
    const target = path.join(publishedDir(root, entry.date), path.basename(entry.currentPath));
    guardPath(root, target);
    await moveFile(entry.currentPath, target);
    return { ...entry, state: 'published', currentPath: target };
  }
  const target = rewrittenPathFor(entry.originalPath);
  guardPath(root, target);
  await moveFile(entry.currentPath, target);
  return { ...entry, state: 'rewritten', currentPath: target };
};

export const writeRewritten = async (root: string, entry: ArchiveEntry, text: string): Promise<string> => {
  const target = rewrittenPathFor(entry.originalPath);
  guardPath(root, target);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, `${text.trimEnd()}\n`, 'utf-8');
  return target;
};

export const MERGED_PREFIX = 'Merged_';

/** Merged output is stored beside the first entry's rewrite as `Merged_<group>_<filename>`. */
export const writeMerged = async (root: string, entries: readonly ArchiveEntry[], group: string, text: string): Promise<string> => {
  const [first] = entries;
  if (!first) {
    throw new ArchiveError('Nothing to merge', { path: root });
  }
  const groupName = group.trim().replace(/\s+/g, '_').replace(/[\\/*?:"<>|]/g, '') || 'Group';
  const target = path.join(rewrittenDir(root, first.date, first.site), `${MERGED_PREFIX}${groupName}_${first.filename}`);
  guardPath(root, target);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, `${text.trimEnd()}\n`, 'utf-8');
  return target;
};

const isMergedFilename = (filename: string): boolean =>
  filename === path.basename(filename) && filename.startsWith(MERGED_PREFIX) && filename.endsWith('.txt');

export const readMergedEntry = async (
  root: string,
  date: CalendarDate,
  site: SiteSlug,
  filename: string,
): Promise<MergedEntry> => {
  if (!isMergedFilename(filename)) {
    throw new ArchiveError(`Invalid merged filename: ${filename}`, { path: filename });
  }
  const published = path.join(publishedDir(root, date), filename);
  const rewritten = path.join(rewrittenDir(root, date, site), filename);
  guardPath(root, published);
  guardPath(root, rewritten);
  if (await isFile(published)) {
    return { site, date, filename, state: 'published', currentPath: published };
  }
  await fs.access(rewritten);
  return { site, date, filename, state: 'rewritten', currentPath: rewritten };
};

/**
 * Merged rewrites for one day. A published merge has left its site folder, so it is matched back
 * to the site whose original filename ends its name.
 */
export const listMerged = async (
  root: string,
  date: CalendarDate,
  sites: readonly SiteSlug[] = SITE_SLUGS,
): Promise<MergedEntry[]> => {
  const publishedMerges = (await listTextFiles(publishedDir(root, date))).filter(isMergedFilename);
  const entries: MergedEntry[] = [];
  for (const site of sites) {
    const names = new Set((await listTextFiles(rewrittenDir(root, date, site))).filter(isMergedFilename));
    const originals = await listTextFiles(originalDir(root, date, site));
    for (const name of publishedMerges) {
      if (originals.some((original) => name.endsWith(`_${original}`))) names.add(name);
    }
    for (const name of [...names].sort()) {
      entries.push(await readMergedEntry(root, date, site, name));
    }
  }
  return entries;
};

/** Rewritten/<merged> ↔ Published/<date>/<merged>. */
export const toggleMergedPublish = async (root: string, entry: MergedEntry): Promise<MergedEntry> => {
  const publishing = entry.state === 'rewritten';
  const target = publishing
    ? path.join(publishedDir(root, entry.date), entry.filename)
    : path.join(rewrittenDir(root, entry.date, entry.site), entry.filename);
  guardPath(root, target);
  await moveFile(entry.currentPath, target);
  return { ...entry, state: publishing ? 'published' : 'rewritten', currentPath: target };
};
