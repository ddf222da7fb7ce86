#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import type { ExtractorConfig } from './types.js';
import { loadConfig } from './config.js';
import { ServiceM8Extractor } from './extractor.js';
import { writeResult } from './output.js';
import { sendToWebhook } from './webhook.js';
import { listDownloads } from './downloads.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { isLogLevel, logger, StepTimer } from './logger.js';

// Load .env from the working directory
loadEnv();

export type RunnableExtractor = Pick<ServiceM8Extractor, 'extract' | 'captureFingerprintOnly' | 'shutdown'>;

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  createExtractor?: (config: ExtractorConfig, timer: StepTimer) => RunnableExtractor;
}

/**
 * Handle SIGINT/SIGTERM: leave an empty result behind, close the browser and exit.
 * Pass a null resultPath to leave the result file untouched.
 */
export async function abortRun(
  signal: string,
  extractor: Pick<RunnableExtractor, 'shutdown'>,
  resultPath: string | null,
  exit: (code: number) => void = code => process.exit(code)
): Promise<void> {
  logger.info(`Received ${signal}, shutting down...`);
  if (resultPath) {
    writeResult(resultPath, null);
  }
  try {
    await extractor.shutdown();
  } catch (error) {
    logger.error(`Error during shutdown: ${errorMessage(error)}`);
    exit(1);
    return;
  }
  exit(130);
}

/**
 * Run one extraction (or a fingerprint capture) and return the exit code
 */
export async function main(options: RunOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const createExtractor =
    options.createExtractor ?? ((config: ExtractorConfig, timer: StepTimer) => new ServiceM8Extractor(config, timer));

  const requestedLevel = env.LOG_LEVEL?.toLowerCase();
  if (requestedLevel && isLogLevel(requestedLevel)) {
    logger.setLevel(requestedLevel);
  }

  const timer = new StepTimer();
  timer.start('ServiceM8 extraction');

  let extractorConfig: ExtractorConfig;
  try {
    extractorConfig = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`❌ ${error.message}`);
      writeResult(resolve(env.RESULT_PATH || 'result.json'), null);
      return 1;
    }
    throw error;
  }

  logger.setLevel(extractorConfig.logLevel);
  if (!logger.attachFile({ path: extractorConfig.logFile })) {
    logger.warn(`⚠️  Continuing without log file ${extractorConfig.logFile}`);
  }
  timer.step('Configuration');

  const resultPath = extractorConfig.captureFingerprint ? null : extractorConfig.resultPath;
  try {
    const extractor = createExtractor(extractorConfig, timer);
    const onSignal = (signal: NodeJS.Signals) => {
      void abortRun(signal, extractor, resultPath);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
    try {
      return await run(extractorConfig, extractor, timer);
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  } catch (error) {
    logger.error(`❌ Run failed: ${errorMessage(error)}`);
    if (resultPath) {
      writeResult(resultPath, null);
    }
    return 1;
  }
}

async function run(extractorConfig: ExtractorConfig, extractor: RunnableExtractor, timer: StepTimer): Promise<number> {
  if (extractorConfig.captureFingerprint) {
    logger.info('🖐️  Fingerprint capture mode');
    const fingerprint = await extractor.captureFingerprintOnly();
    timer.finish('Fingerprint capture');
    return fingerprint ? 0 : 1;
  }

  const result = await extractor.extract();
  writeResult(extractorConfig.resultPath, result);
  timer.step('Result saved');

  if (result && extractorConfig.webhookUrl) {
    await sendToWebhook(extractorConfig.webhookUrl, result, { envelope: extractorConfig.webhookEnvelope });
    timer.step('Webhook delivery');
  }

  const downloads = listDownloads(extractorConfig.downloadDir);
  if (downloads.length > 0) {
    logger.info(`📂 ${downloads.length} file(s) in ${extractorConfig.downloadDir}, newest: ${downloads[0].name}`);
  }

  timer.finish('ServiceM8 extraction');
  if (!result) {
    logger.error('❌ Extraction failed');
    return 1;
  }
  logger.info('✅ Extraction completed successfully');
  return 0;
}

if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch(error => {
      logger.error(`Fatal error: ${errorMessage(error)}`);
      process.exit(1);
    });
}
