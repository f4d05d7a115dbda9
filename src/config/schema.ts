import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 * Ensures type safety and validation of all configuration values
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);

export const CacheConfigSchema = z.object({
  path: z.string(),
  // Seconds; no default
  ttl: z.number({ required_error: 'cache_ttl is required' }).int().min(0),
});

export const XenConfigSchema = z.object({
  host: z.string().default(''),
  username: z.string().default(''),
  password: z.string().default(''),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('warn'),
  format: LogFormatSchema.default('simple'),
  file: z.string().optional(),
  silent: z.boolean().default(false),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  cache: CacheConfigSchema,
  xen: XenConfigSchema,
  logging: LoggingConfigSchema,
});

/**
 * TypeScript type derived from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type XenConfig = z.infer<typeof XenConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
