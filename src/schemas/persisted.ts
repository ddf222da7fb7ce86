import { z } from 'zod';
import type {
  ApiEndpointRecord,
  DeviceFingerprint,
  ExtractionResult,
  GroupedResult,
  StoredCookie
} from '../types.js';

/**
 * Schemas for the JSON files the extractor reads back from disk.
 * Every file may have been hand-edited or written by an older version,
 * so reads go through these before use.
 */

export const DeviceFingerprintSchema: z.ZodType<DeviceFingerprint, z.ZodTypeDef, unknown> = z.object({
  user_agent: z.string().min(1),
  platform: z.string(),
  language: z.string(),
  languages: z.array(z.string()),
  timezone: z.string(),
  screen_resolution: z
    .string()
    .regex(/^\d+x\d+$/, 'Screen resolution must look like 1920x1080'),
  color_depth: z.number(),
  pixel_ratio: z.number().positive(),
  webgl_vendor: z.string(),
  webgl_renderer: z.string(),
  hardware_concurrency: z.number().optional(),
  max_touch_points: z.number().optional(),
  cookie_enabled: z.boolean().optional(),
  do_not_track: z.string().nullable().optional(),
  timestamp: z.number(),
  capture_method: z.string().optional(),
  capture_date: z.string().optional()
});

// Older jars (and other tools) omit most attributes; fill in browser defaults
export const StoredCookieSchema: z.ZodType<StoredCookie, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string().default(''),
  path: z.string().default('/'),
  expires: z.number().default(-1),
  httpOnly: z.boolean().default(false),
  secure: z.boolean().default(false),
  sameSite: z.enum(['Strict', 'Lax', 'None']).default('Lax')
});

export const CookieJarSchema = z.array(StoredCookieSchema);

const FallbackTypeSchema = z.enum(['fallback_calendar', 'fallback_general']);

export const ApiEndpointRecordSchema: z.ZodType<ApiEndpointRecord, z.ZodTypeDef, unknown> = z.object({
  url: z.string().url(),
  cookie: z.string(),
  s_auth: z.string().regex(/^[a-f0-9]+$/),
  type: FallbackTypeSchema.optional()
});

export const GroupedResultSchema: z.ZodType<GroupedResult, z.ZodTypeDef, unknown> = z.object({
  cookie: z.string(),
  api_endpoints: z.array(
    z.object({
      url: z.string().url(),
      s_auth: z.string().regex(/^[a-f0-9]+$/),
      type: FallbackTypeSchema.optional()
    })
  )
});

export const ExtractionResultSchema: z.ZodType<ExtractionResult, z.ZodTypeDef, unknown> = z.union([
  z.array(ApiEndpointRecordSchema),
  GroupedResultSchema
]);
