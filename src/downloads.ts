import { existsSync, mkdirSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import type { Download } from 'playwright';
import type { DownloadedFile } from './types.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

/** The part of a Playwright download the saver needs */
export type DownloadLike = Pick<Download, 'suggestedFilename' | 'saveAs'>;

/**
 * Save a download the page started into dir.
 * Returns the saved path, or null when saving failed.
 */
export async function saveDownload(download: DownloadLike, dir: string, filename?: string): Promise<string | null> {
  const target = join(dir, filename || download.suggestedFilename());
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    await download.saveAs(target);
    logger.info(`📥 Download saved to ${target}`);
    return target;
  } catch (error) {
    logger.error(`Failed to save download ${target}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Regular files in dir, newest first
 */
export function listDownloads(dir: string): DownloadedFile[] {
  if (!existsSync(dir)) {
    return [];
  }

  const files: DownloadedFile[] = [];
  for (const name of readdirSync(dir)) {
    const filePath = join(dir, name);
    const stats = statSync(filePath);
    if (stats.isFile()) {
      files.push({ name, path: filePath, size: stats.size, modified: stats.mtimeMs });
    }
  }

  return files.sort((a, b) => b.modified - a.modified);
}
