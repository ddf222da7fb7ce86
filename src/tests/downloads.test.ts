import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { listDownloads, saveDownload, type DownloadLike } from '../downloads';

const fakeDownload = (suggested: string, content: string): DownloadLike => ({
  suggestedFilename: () => suggested,
  saveAs: async (path: string) => {
    writeFileSync(path, content);
  }
});

describe('downloads', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'downloads-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('saves under the suggested name in a new directory', async () => {
    const target = join(dir, 'nested');

    const saved = await saveDownload(fakeDownload('jobs.csv', 'a,b'), target);

    expect(saved).toBe(join(target, 'jobs.csv'));
    expect(readFileSync(join(target, 'jobs.csv'), 'utf-8')).toBe('a,b');
  });

  it('uses an explicit file name', async () => {
    await expect(saveDownload(fakeDownload('jobs.csv', 'x'), dir, 'today.csv')).resolves.toBe(join(dir, 'today.csv'));
    expect(existsSync(join(dir, 'jobs.csv'))).toBe(false);
  });

  it('returns null when the browser cannot save the file', async () => {
    const failing: DownloadLike = {
      suggestedFilename: () => 'jobs.csv',
      saveAs: async () => {
        throw new Error('Download was canceled');
      }
    };

    await expect(saveDownload(failing, dir)).resolves.toBeNull();
  });

  it('lists regular files newest first', () => {
    writeFileSync(join(dir, 'old.csv'), 'old');
    writeFileSync(join(dir, 'new.csv'), 'newer');
    mkdirSync(join(dir, 'folder'));
    utimesSync(join(dir, 'old.csv'), new Date('2020-01-01T00:00:00Z'), new Date('2020-01-01T00:00:00Z'));
    utimesSync(join(dir, 'new.csv'), new Date('2021-01-01T00:00:00Z'), new Date('2021-01-01T00:00:00Z'));

    const files = listDownloads(dir);

    expect(files.map(file => file.name)).toEqual(['new.csv', 'old.csv']);
    expect(files[0]).toEqual({
      name: 'new.csv',
      path: join(dir, 'new.csv'),
      size: 5,
      modified: new Date('2021-01-01T00:00:00Z').getTime()
    });
  });

  it('lists nothing for a missing directory', () => {
    expect(listDownloads(join(dir, 'missing'))).toEqual([]);
  });
});
