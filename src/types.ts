// Configuration and environment
export type OutputFormat = 'list' | 'grouped';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Credentials {
  email: string;
  password: string;
  authCode?: string;
}

export interface ExtractorConfig {
  credentials: Credentials;
  serverMode: boolean;
  headful: boolean;
  captureFingerprint: boolean;
  killStaleBrowsers: boolean;
  maxRetries: number;
  downloadDir: string;
  resultPath: string;
  fingerprintPath: string;
  cookiesPath: string;
  screenshotsDir: string;
  logFile: string;
  logLevel: LogLevel;
  outputFormat: OutputFormat;
  dispatchSettleMs: number;
  webhookUrl?: string;
  webhookEnvelope: boolean;
}

// Device fingerprint replayed into new sessions
export interface DeviceFingerprint {
  user_agent: string;
  platform: string;
  language: string;
  languages: string[];
  timezone: string;
  screen_resolution: string;
  color_depth: number;
  pixel_ratio: number;
  webgl_vendor: string;
  webgl_renderer: string;
  hardware_concurrency?: number;
  max_touch_points?: number;
  cookie_enabled?: boolean;
  do_not_track?: string | null;
  /** Seconds since the epoch */
  timestamp: number;
  capture_method?: string;
  capture_date?: string;
}

export type SameSite = 'Strict' | 'Lax' | 'None';

export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: SameSite;
}

// Tokens scraped from the Dispatch Board
export type RpcTokenKey =
  | 'CalendarStoreRequest'
  | 'UpdateReminderForJobActivity'
  | 'SaveRecurringJobSchedule';

export type FallbackTokenKey = 'GeneralAuth' | 'FallbackAuth';

export type AuthTokenMap = Partial<Record<RpcTokenKey | FallbackTokenKey, string>>;

export interface PageSources {
  scripts: string[];
  globals: string[];
  html: string;
}

export interface ExtractedSession {
  tokens: AuthTokenMap;
  cookie: string;
}

// Output records
export type FallbackEndpointType = 'fallback_calendar' | 'fallback_general';

export interface ApiEndpointRecord {
  url: string;
  cookie: string;
  s_auth: string;
  type?: FallbackEndpointType;
}

export interface GroupedEndpoint {
  url: string;
  s_auth: string;
  type?: FallbackEndpointType;
}

export interface GroupedResult {
  cookie: string;
  api_endpoints: GroupedEndpoint[];
}

export type ExtractionResult = ApiEndpointRecord[] | GroupedResult;

export interface DownloadedFile {
  name: string;
  path: string;
  size: number;
  /** Milliseconds since the epoch */
  modified: number;
}
