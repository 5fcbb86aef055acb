import config from 'config';
import { z } from 'zod';
import { log, LogLevel } from './logger';

// Schemas mirror config/default.json. Engine-owned sections are strict so a
// misspelt key fails at load time instead of silently falling back to a default.

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date');

export const LOCATION_KINDS = ['home', 'office', 'remote', 'off'] as const;
export type LocationKind = typeof LOCATION_KINDS[number];

export const WEEKDAY_KEYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;
export type WeekdayKey = typeof WEEKDAY_KEYS[number];

const locationKindSchema = z.enum(LOCATION_KINDS);

// LOG_LEVEL=debug is as good as LOG_LEVEL=DEBUG.
const logLevelSchema = z.preprocess(
  value => (typeof value === 'string' ? value.toUpperCase() : value),
  z.nativeEnum(LogLevel),
);

const loggingSchema = z.object({
  consoleLogLevel: logLevelSchema,
  fileLogLevel: logLevelSchema,
  logFile: z.string().nullable(),
  consoleQuietMode: z.boolean(),
}).strict();

const alternatingDaySchema = z.object({
  evenWeek: locationKindSchema,
  oddWeek: locationKindSchema,
}).strict();

const weekdayPatternSchema = z.union([locationKindSchema, alternatingDaySchema]);

const workCalendarSchema = z.object({
  locations: z.object({
    home: z.string().min(1),
    office: z.string().min(1),
    remote: z.string().min(1),
    off: z.string().min(1),
  }).strict(),
  weekdays: z.object({
    monday: weekdayPatternSchema,
    tuesday: weekdayPatternSchema,
    wednesday: weekdayPatternSchema,
    thursday: weekdayPatternSchema,
    friday: weekdayPatternSchema,
    saturday: weekdayPatternSchema,
    sunday: weekdayPatternSchema,
  }).strict(),
  holidays: z.array(z.object({ date: isoDate, name: z.string().min(1) }).strict()),
  vacations: z.array(
    z.object({ start: isoDate, end: isoDate, name: z.string().min(1) })
      .strict()
      .refine(v => v.start <= v.end, { message: 'vacation start must not be after its end' }),
  ),
}).strict();

const localeSchema = z.object({
  monthNames: z.array(z.string().min(1)).length(12),
  weekdayNames: z.array(z.string().min(1)).length(7),
}).strict();

export const appConfigSchema = z.object({
  env: z.string(),
  appName: z.string(),
  version: z.string(),
  logging: loggingSchema,
  vault: z.object({ path: z.string().min(1) }).strict(),
  locale: localeSchema,
  week: z.object({ length: z.coerce.number().int().min(1).max(7) }).strict(),
  workCalendar: workCalendarSchema,
});

export type LoggingConfig = z.infer<typeof loggingSchema>;
export type WorkCalendarConfig = z.infer<typeof workCalendarSchema>;
export type WeekdayPattern = z.infer<typeof weekdayPatternSchema>;
export type LocaleConfig = z.infer<typeof localeSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validates a raw configuration object (as produced by the 'config' package
 * or built by hand in tests) into an AppConfig.
 */
export function parseAppConfig(raw: unknown): AppConfig {
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigValidationError(issues);
  }
  return result.data;
}

/**
 * Loads the application configuration using the 'config' package.
 * This reads config/default.json (and environment specific files) and merges
 * environment variables according to config/custom-environment-variables.json.
 */
export function loadConfig(): AppConfig {
  const loadedConfig = parseAppConfig(config.util.toObject());
  log(LogLevel.DEBUG, 'Application config loaded:', { vault: loadedConfig.vault.path, env: loadedConfig.env });
  return loadedConfig;
}
