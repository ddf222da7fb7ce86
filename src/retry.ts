import { AccessDeniedError, errorMessage } from './errors.js';
import { logger } from './logger.js';

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export interface StageOptions {
  /** Runs after the delay and before the next attempt, e.g. a page refresh */
  beforeRetry?: (nextAttempt: number) => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

/** A failed attempt returns one of these instead of a value */
export type StageFailure = null | false;

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export const STAGE_POLICIES = {
  browserInit: { attempts: 3, delayMs: 5_000 },
  pageLoad: { attempts: 3, delayMs: 5_000 },
  login: (attempts: number): RetryPolicy => ({ attempts, delayMs: 5_000 }),
  navigation: (attempts: number): RetryPolicy => ({ attempts, delayMs: 15_000 }),
  extraction: (attempts: number): RetryPolicy => ({ attempts, delayMs: 5_000 })
} as const;

/**
 * Run a stage with a fixed number of attempts and a fixed delay between them.
 * Never throws: exhausting the attempts (or hitting an access-denied page)
 * yields null.
 */
export async function runStage<T>(
  stage: string,
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<T | StageFailure>,
  options: StageOptions = {}
): Promise<T | null> {
  const wait = options.sleep ?? sleep;

  for (let attemptNumber = 1; attemptNumber <= policy.attempts; attemptNumber++) {
    logger.info(`🔁 ${stage} attempt ${attemptNumber}/${policy.attempts}`);

    try {
      const result = await attempt(attemptNumber);
      if (result !== null && result !== false) {
        if (attemptNumber > 1) {
          logger.info(`✅ ${stage} succeeded on attempt ${attemptNumber}`);
        }
        return result;
      }
      logger.warn(`⚠️ ${stage} attempt ${attemptNumber} did not succeed`);
    } catch (error) {
      if (error instanceof AccessDeniedError) {
        logger.error(`❌ ${stage} stopped: ${error.message}`);
        return null;
      }
      logger.error(`❌ ${stage} error on attempt ${attemptNumber}: ${errorMessage(error)}`);
    }

    if (attemptNumber < policy.attempts) {
      logger.info(`⏳ Waiting ${policy.delayMs / 1000} seconds before retry...`);
      await wait(policy.delayMs);
      if (options.beforeRetry) {
        try {
          await options.beforeRetry(attemptNumber + 1);
        } catch (hookError) {
          logger.warn(`⚠️ ${stage} pre-retry step failed: ${errorMessage(hookError)}`);
        }
      }
    }
  }

  logger.error(`❌ ${stage} failed after ${policy.attempts} attempt(s)`);
  return null;
}
