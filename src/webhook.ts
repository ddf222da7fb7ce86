import type { ExtractionResult } from './types.js';
import { endpointCount } from './api-endpoints.js';
import { WebhookDeliveryError, errorMessage } from './errors.js';
import { logger } from './logger.js';

export const WEBHOOK_TIMEOUT_MS = 30_000;

export interface WebhookOptions {
  /** Wrap the result with a timestamp and endpoint count */
  envelope?: boolean;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export type WebhookBody =
  | { data: ExtractionResult }
  | { servicem8_data: ExtractionResult; timestamp: string; total_endpoints: number };

export function buildWebhookBody(result: ExtractionResult, envelope: boolean, now: Date = new Date()): WebhookBody {
  if (!envelope) {
    return { data: result };
  }
  return {
    servicem8_data: result,
    timestamp: now.toISOString(),
    total_endpoints: endpointCount(result)
  };
}

/**
 * POST the result as JSON. Only a 200 response counts as delivered;
 * every failure is logged and reported as false.
 */
export async function sendToWebhook(
  url: string | undefined,
  result: ExtractionResult | null,
  options: WebhookOptions = {}
): Promise<boolean> {
  if (!url) {
    logger.info('No webhook URL configured, skipping webhook');
    return false;
  }
  if (result === null || endpointCount(result) === 0) {
    logger.warn('⚠️ No data to send to webhook');
    return false;
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  const body = buildWebhookBody(result, options.envelope ?? false, options.now?.());

  try {
    logger.info(`📤 Sending data to webhook: ${url}`);
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS)
    });

    if (response.status !== 200) {
      const failure = new WebhookDeliveryError(response.status, await response.text());
      logger.error(`❌ ${failure.message}`);
      return false;
    }

    logger.info(`✅ Data sent to webhook successfully (${endpointCount(result)} endpoint(s))`);
    return true;
  } catch (error) {
    logger.error(`❌ Error sending data to webhook: ${errorMessage(error)}`);
    return false;
  }
}
