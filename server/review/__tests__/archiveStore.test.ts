import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArchiveError } from '../../errors';
import { formatArticleText } from '../../persistence/articleFile';
import {
  articleStatus,
  listArchiveDates,
  listMerged,
  listOriginals,
  readEntry,
  readMergedEntry,
  resolveOriginalPath,
  toggleMergedPublish,
  togglePublish,
  writeMerged,
  writeRewritten,
} from '../archiveStore';

describe('archiveStore', () => {
  let root: string;
  let originalPath: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'archive-store-'));
    const dir = path.join(root, '2025-06-01', 'wcax', 'Original');
    await fs.mkdir(dir, { recursive: true });
    originalPath = path.join(dir, 'Bridge repair.txt');
    await fs.writeFile(
      originalPath,
      formatArticleText(
        { url: 'https://www.wcax.com/2025/06/01/bridge/', title: 'Bridge repair', publishedDate: '2025-06-01', paragraphs: ['Fixed.'] },
        'wcax',
      ),
    );
    await fs.mkdir(path.join(root, '2025-05-31'), { recursive: true });
    await fs.mkdir(path.join(root, 'Published'), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists dated folders newest first', async () => {
    expect(await listArchiveDates(root)).toEqual(['2025-06-01', '2025-05-31']);
  });

  it('lists originals with their review state', async () => {
    expect(await listOriginals(root, '2025-06-01')).toEqual([
      {
        site: 'wcax',
        date: '2025-06-01',
        filename: 'Bridge repair.txt',
        title: 'Bridge repair',
        url: 'https://www.wcax.com/2025/06/01/bridge/',
        originalPath,
        state: 'original',
        currentPath: originalPath,
      },
    ]);
    expect(await listOriginals(root, '2025-06-01', ['wmur'])).toEqual([]);
  });

  it('moves a rewrite to Published and back', async () => {
    const entry = await readEntry(root, '2025-06-01', 'wcax', 'Bridge repair.txt');
    const rewrittenPath = await writeRewritten(root, entry, 'Bridge Work Finished\n\nCrews wrapped up.');
    expect(rewrittenPath).toBe(path.join(root, '2025-06-01', 'wcax', 'Rewritten', 'Bridge repair.txt'));
    expect(await articleStatus(root, '2025-06-01', originalPath)).toEqual({ state: 'rewritten', currentPath: rewrittenPath });

    const published = await togglePublish(root, await readEntry(root, '2025-06-01', 'wcax', 'Bridge repair.txt'));
    const publishedPath = path.join(root, 'Published', '2025-06-01', 'Bridge repair.txt');
    expect(published).toMatchObject({ state: 'published', currentPath: publishedPath });
    expect(await fs.readFile(publishedPath, 'utf-8')).toBe('Bridge Work Finished\n\nCrews wrapped up.\n');

    const unpublished = await togglePublish(root, published);
    expect(unpublished).toMatchObject({ state: 'rewritten', currentPath: rewrittenPath });
    expect(await fs.readdir(path.join(root, 'Published', '2025-06-01'))).toEqual([]);
  });

  it('refuses to publish an article that has not been rewritten', async () => {
    const entry = await readEntry(root, '2025-06-01', 'wcax', 'Bridge repair.txt');
    await expect(togglePublish(root, entry)).rejects.toBeInstanceOf(ArchiveError);
  });

  it('rejects filenames that would leave the site folder', () => {
    expect(() => resolveOriginalPath(root, '2025-06-01', 'wcax', '../../secrets.txt')).toThrow(ArchiveError);
    expect(() => resolveOriginalPath(root, '2025-06-01', 'wcax', 'notes.json')).toThrow(ArchiveError);
  });

  it('stores merges under the first entry with a group prefix', async () => {
    const entry = await readEntry(root, '2025-06-01', 'wcax', 'Bridge repair.txt');
    const merged = await writeMerged(root, [entry], 'Route 9 / bridge', 'Merged text');
    expect(merged).toBe(path.join(root, '2025-06-01', 'wcax', 'Rewritten', 'Merged_Route_9__bridge_Bridge repair.txt'));
  });

  it('lists merged rewrites and moves them to Published and back', async () => {
    const entry = await readEntry(root, '2025-06-01', 'wcax', 'Bridge repair.txt');
    const mergedPath = await writeMerged(root, [entry], 'Bridges', 'Merged text');
    const filename = 'Merged_Bridges_Bridge repair.txt';
    const publishedPath = path.join(root, 'Published', '2025-06-01', filename);

    expect(await listMerged(root, '2025-06-01')).toEqual([
      { site: 'wcax', date: '2025-06-01', filename, state: 'rewritten', currentPath: mergedPath },
    ]);

    const published = await toggleMergedPublish(root, await readMergedEntry(root, '2025-06-01', 'wcax', filename));
    expect(published).toEqual({ site: 'wcax', date: '2025-06-01', filename, state: 'published', currentPath: publishedPath });
    expect(await fs.readFile(publishedPath, 'utf-8')).toBe('Merged text\n');
    expect(await listMerged(root, '2025-06-01')).toEqual([published]);
    expect(await listMerged(root, '2025-06-01', ['wmur'])).toEqual([]);

    const unpublished = await toggleMergedPublish(root, published);
    expect(unpublished).toMatchObject({ state: 'rewritten', currentPath: mergedPath });
    expect(await fs.readdir(path.join(root, 'Published', '2025-06-01'))).toEqual([]);
  });

  it('keeps merged rewrites out of the article listing and rejects plain filenames', async () => {
    const entry = await readEntry(root, '2025-06-01', 'wcax', 'Bridge repair.txt');
    await writeMerged(root, [entry], 'Bridges', 'Merged text');
    expect((await listOriginals(root, '2025-06-01')).map((item) => item.filename)).toEqual(['Bridge repair.txt']);
    await expect(readMergedEntry(root, '2025-06-01', 'wcax', 'Bridge repair.txt')).rejects.toBeInstanceOf(ArchiveError);
    await expect(readMergedEntry(root, '2025-06-01', 'wcax', 'Merged_Missing_Bridge repair.txt')).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});
