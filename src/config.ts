/**
 * @fileoverview Centralized CLI configuration.
 *
 * All environment variables are loaded and validated here, so there is a
 * single place that lists what the tool reads from its environment.
 *
 * @see .env.example for the supported variables
 */

import 'dotenv/config';
import { LOG_LEVELS, parseLogLevel } from './utils/observability/index.js';

/** How date-only (all-day) starts take part in the upcoming-event check. */
export type AllDayPolicy = 'utc-midnight' | 'reject';

export const ALL_DAY_POLICIES: readonly AllDayPolicy[] = ['utc-midnight', 'reject'];

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function isAllDayPolicy(value: string): value is AllDayPolicy {
  return ALL_DAY_POLICIES.some((policy) => policy === value);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const rawAllDay = optional('ALL_DAY_EVENTS', 'utc-midnight').toLowerCase();

const config = {
  /**
   * Logging configuration. The logger reads LOG_LEVEL and APP_LOG_FILE
   * itself on every record; these copies exist for validation.
   */
  log: {
    level: optional('LOG_LEVEL', 'warn'),
    file: process.env.APP_LOG_FILE,
  },

  /** Calendar handling */
  calendar: {
    allDayPolicy: isAllDayPolicy(rawAllDay) ? rawAllDay : 'utc-midnight',
    rawAllDayPolicy: rawAllDay,
  },
} satisfies {
  log: { level: string; file: string | undefined };
  calendar: { allDayPolicy: AllDayPolicy; rawAllDayPolicy: string };
};

/**
 * Validate configuration at startup.
 * Throws if any value is invalid, listing every problem at once.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (parseLogLevel(config.log.level) === null) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got ${config.log.level}`);
  }

  if (!isAllDayPolicy(config.calendar.rawAllDayPolicy)) {
    errors.push(
      `ALL_DAY_EVENTS must be one of ${ALL_DAY_POLICIES.join(', ')}, got ${config.calendar.rawAllDayPolicy}`
    );
  }

  if (config.log.file !== undefined && config.log.file.trim() === '') {
    errors.push('APP_LOG_FILE must not be blank when set');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
