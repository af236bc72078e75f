import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { sweepArchive } from '../retention';

describe('sweepArchive', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'archive-sweep-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('removes dated folders older than the retention window in the root and Published', async () => {
    for (const dir of ['2024-01-01/wmur/Original', '2025-05-02', '2025-05-01', 'notes', 'Published/2024-01-01', 'Published/2025-06-01']) {
      await fs.mkdir(path.join(root, dir), { recursive: true });
    }

    const deleted = await sweepArchive({ rootDir: root, retentionDays: 30, today: '2025-06-01' });

    expect(deleted.sort()).toEqual(
      [path.join(root, '2024-01-01'), path.join(root, '2025-05-01'), path.join(root, 'Published', '2024-01-01')].sort(),
    );
    expect((await fs.readdir(root)).sort()).toEqual(['2025-05-02', 'Published', 'notes']);
    expect(await fs.readdir(path.join(root, 'Published'))).toEqual(['2025-06-01']);
  });

  it('does nothing when the archive root does not exist yet', async () => {
    await expect(
      sweepArchive({ rootDir: path.join(root, 'missing'), retentionDays: 30, today: '2025-06-01' }),
    ).resolves.toEqual([]);
  });
});
