import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { ExtractionResult } from './types.js';
import { ExtractionResultSchema } from './schemas/persisted.js';
import { endpointCount } from './api-endpoints.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

const INDENT = 3;

function isEmpty(result: ExtractionResult | null): boolean {
  return result === null || endpointCount(result) === 0;
}

/**
 * Write the result file. A missing or empty result is written as `[]`, and a
 * failed write is retried once with `[]` so consumers always find valid JSON.
 */
export function writeResult(filePath: string, result: ExtractionResult | null): boolean {
  const payload: ExtractionResult = result === null || isEmpty(result) ? [] : result;

  try {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(filePath, JSON.stringify(payload, null, INDENT));
    if (isEmpty(payload)) {
      logger.warn(`⚠️ No API data extracted, wrote empty array to ${filePath}`);
    } else {
      logger.info(`💾 Saved ${endpointCount(payload)} endpoint(s) to ${filePath}`);
    }
    return true;
  } catch (error) {
    logger.error(`Failed to save result to ${filePath}: ${errorMessage(error)}`);
  }

  try {
    writeFileSync(filePath, JSON.stringify([], null, INDENT));
    logger.warn(`⚠️ Wrote empty array to ${filePath} after failed save`);
  } catch (retryError) {
    logger.error(`Failed to write empty result to ${filePath}: ${errorMessage(retryError)}`);
  }
  return false;
}

/**
 * Read and validate a previously written result file
 */
export function readResult(filePath: string): ExtractionResult | null {
  if (!existsSync(filePath)) {
    logger.error(`Result file not found: ${filePath}`);
    return null;
  }

  try {
    const parsed = ExtractionResultSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
    if (!parsed.success) {
      logger.error(`Result file ${filePath} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
      return null;
    }
    return parsed.data;
  } catch (error) {
    logger.error(`Failed to read result file ${filePath}: ${errorMessage(error)}`);
    return null;
  }
}
