/**
 * Error classes raised inside stages. The retry runner turns them into
 * sentinels, so only ConfigurationError is expected to reach an entry point.
 */
export class ExtractorError extends Error {
  originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message);
    this.name = 'ExtractorError';
    this.originalError = originalError;
  }
}

export class ConfigurationError extends ExtractorError {
  constructor(public readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`);
    this.name = 'ConfigurationError';
  }
}

export class BrowserLaunchError extends ExtractorError {
  constructor(attempts: number, originalError?: Error) {
    super(
      `Failed to launch browser after ${attempts} attempt(s)${originalError ? `: ${originalError.message}` : ''}`,
      originalError
    );
    this.name = 'BrowserLaunchError';
  }
}

export class AccessDeniedError extends ExtractorError {
  constructor(public readonly url: string, public readonly title: string) {
    super(`Access denied to Dispatch Board at ${url} (title: "${title}")`);
    this.name = 'AccessDeniedError';
  }
}

export class TwoFactorError extends ExtractorError {
  constructor(message: string) {
    super(message);
    this.name = 'TwoFactorError';
  }
}

export class WebhookDeliveryError extends ExtractorError {
  constructor(public readonly status: number, public readonly body: string) {
    super(`Webhook responded with ${status}: ${body.substring(0, 200)}`);
    this.name = 'WebhookDeliveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
