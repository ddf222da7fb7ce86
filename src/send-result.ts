#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { isAbsolute, join } from 'path';
import { readResult } from './output.js';
import { sendToWebhook } from './webhook.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

loadEnv();

/**
 * Re-send an existing result file to the webhook, wrapped in the envelope
 */
export async function sendResult(env: Record<string, string | undefined> = process.env): Promise<number> {
  const webhookUrl = env.WEBHOOK;
  if (!webhookUrl) {
    logger.error('❌ WEBHOOK environment variable is not set');
    return 1;
  }

  const raw = env.RESULT_PATH || 'result.json';
  const resultPath = isAbsolute(raw) ? raw : join(process.cwd(), raw);
  const result = readResult(resultPath);
  if (!result) {
    return 1;
  }

  return (await sendToWebhook(webhookUrl, result, { envelope: true })) ? 0 : 1;
}

if (require.main === module) {
  sendResult()
    .then(code => process.exit(code))
    .catch(error => {
      logger.error(`Fatal error: ${errorMessage(error)}`);
      process.exit(1);
    });
}
