import { isAbsolute, join } from 'path';
import type { ExtractorConfig, OutputFormat } from './types.js';
import { ConfigurationError } from './errors.js';
import { isLogLevel, logger } from './logger.js';

export const BASE_URL = 'https://go.servicem8.com';

type Env = Record<string, string | undefined>;

function flag(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true';
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function resolvePath(value: string | undefined, fallback: string, cwd: string): string {
  const raw = value || fallback;
  return isAbsolute(raw) ? raw : join(cwd, raw);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): ExtractorConfig {
  const requiredEnvVars = ['EMAIL', 'PASSWORD'];
  const missing = requiredEnvVars.filter(envVar => !env[envVar]);

  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }

  const serverMode = flag(env.SERVER_MODE);
  const level = (env.LOG_LEVEL || 'info').toLowerCase();
  const outputFormat: OutputFormat = env.OUTPUT_FORMAT?.toLowerCase() === 'grouped' ? 'grouped' : 'list';

  const config: ExtractorConfig = {
    credentials: {
      email: env.EMAIL ?? '',
      password: env.PASSWORD ?? '',
      authCode: env.AUTH_CODE || undefined
    },
    serverMode,
    // Server mode always runs headless
    headful: !serverMode && flag(env.HEADFUL),
    captureFingerprint: flag(env.CAPTURE_FINGERPRINT),
    killStaleBrowsers: flag(env.KILL_STALE_BROWSERS, serverMode),
    maxRetries: positiveInt(env.MAX_RETRIES, 3),
    downloadDir: resolvePath(env.DOWNLOAD_DIR, 'downloads', cwd),
    resultPath: resolvePath(env.RESULT_PATH, 'result.json', cwd),
    fingerprintPath: resolvePath(env.FINGERPRINT_PATH, 'device_fingerprint.json', cwd),
    cookiesPath: resolvePath(env.COOKIES_PATH, 'servicem8_cookies.json', cwd),
    screenshotsDir: resolvePath(env.SCREENSHOTS_DIR, 'screenshots', cwd),
    logFile: resolvePath(env.LOG_FILE, 'servicem8_extractor.log', cwd),
    logLevel: isLogLevel(level) ? level : 'info',
    outputFormat,
    dispatchSettleMs: positiveInt(env.DISPATCH_SETTLE_MS, 20_000),
    webhookUrl: env.WEBHOOK || undefined,
    webhookEnvelope: flag(env.WEBHOOK_ENVELOPE)
  };

  logger.debug('🔧 Configuration loaded:', {
    serverMode: config.serverMode,
    headful: config.headful,
    maxRetries: config.maxRetries,
    outputFormat: config.outputFormat,
    webhook: config.webhookUrl ? 'set' : 'not set',
    workingDir: cwd
  });

  if (config.serverMode && !config.credentials.authCode) {
    logger.warn('⚠️  AUTH_CODE not provided - 2FA may fail on server');
  }

  return config;
}
