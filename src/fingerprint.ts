import { existsSync, readFileSync, writeFileSync } from 'fs';
import type { Page } from 'playwright';
import type { DeviceFingerprint } from './types.js';
import { DeviceFingerprintSchema } from './schemas/persisted.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

export const FINGERPRINT_MAX_AGE_S = 30 * 24 * 60 * 60;

export function isFingerprintFresh(fingerprint: DeviceFingerprint, nowMs: number = Date.now()): boolean {
  const ageSeconds = nowMs / 1000 - fingerprint.timestamp;
  return ageSeconds <= FINGERPRINT_MAX_AGE_S;
}

export function parseScreenResolution(resolution: string): { width: number; height: number } {
  const [width, height] = resolution.split('x').map(part => parseInt(part, 10));
  return {
    width: Number.isFinite(width) && width > 0 ? width : 1920,
    height: Number.isFinite(height) && height > 0 ? height : 1080
  };
}

/**
 * Read the browser identity attributes of the page's current environment
 */
export async function captureFingerprint(page: Page, captureMethod: string = 'automatic'): Promise<DeviceFingerprint> {
  const attributes = await page.evaluate(() => {
    const webgl = (parameter: 'VENDOR' | 'RENDERER'): string => {
      try {
        const canvas = document.createElement('canvas');
        const gl = canvas.getContext('webgl');
        if (!gl) return 'unknown';
        const value: unknown = gl.getParameter(parameter === 'VENDOR' ? gl.VENDOR : gl.RENDERER);
        return typeof value === 'string' ? value : 'unknown';
      } catch {
        return 'unknown';
      }
    };

    return {
      user_agent: navigator.userAgent,
      platform: navigator.platform,
      language: navigator.language,
      languages: Array.from(navigator.languages),
      timezone: Intl.DateTimeFormat().resolvedOptions().timeZone,
      screen_resolution: `${screen.width}x${screen.height}`,
      color_depth: screen.colorDepth,
      pixel_ratio: window.devicePixelRatio,
      webgl_vendor: webgl('VENDOR'),
      webgl_renderer: webgl('RENDERER'),
      hardware_concurrency: navigator.hardwareConcurrency,
      max_touch_points: navigator.maxTouchPoints,
      cookie_enabled: navigator.cookieEnabled,
      do_not_track: navigator.doNotTrack
    };
  });

  const now = new Date();
  return {
    ...attributes,
    timestamp: now.getTime() / 1000,
    capture_method: captureMethod,
    capture_date: now.toISOString()
  };
}

export function saveFingerprint(filePath: string, fingerprint: DeviceFingerprint): boolean {
  try {
    writeFileSync(filePath, JSON.stringify(fingerprint, null, 2));
    logger.info(`🖐️  Device fingerprint saved to ${filePath}`);
    return true;
  } catch (error) {
    logger.error(`Failed to save device fingerprint: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Load a stored fingerprint; null when missing, malformed or older than 30 days
 */
export function loadFingerprint(filePath: string, nowMs: number = Date.now()): DeviceFingerprint | null {
  if (!existsSync(filePath)) {
    logger.info('No device fingerprint found, will create new one');
    return null;
  }

  try {
    const parsed = DeviceFingerprintSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
    if (!parsed.success) {
      logger.warn(`⚠️ Device fingerprint at ${filePath} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
      return null;
    }
    if (!isFingerprintFresh(parsed.data, nowMs)) {
      logger.info('Device fingerprint is too old, will create new one');
      return null;
    }
    logger.info('🖐️  Loaded existing device fingerprint');
    return parsed.data;
  } catch (error) {
    logger.error(`Failed to load device fingerprint: ${errorMessage(error)}`);
    return null;
  }
}

export function describeFingerprint(fingerprint: DeviceFingerprint): string[] {
  return [
    `📱 User Agent: ${fingerprint.user_agent}`,
    `💻 Platform: ${fingerprint.platform}`,
    `🌍 Language: ${fingerprint.language}`,
    `📺 Screen Resolution: ${fingerprint.screen_resolution}`,
    `🕐 Timezone: ${fingerprint.timezone}`,
    `🎮 WebGL Vendor: ${fingerprint.webgl_vendor}`,
    `🎮 WebGL Renderer: ${fingerprint.webgl_renderer}`
  ];
}
