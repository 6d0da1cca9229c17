import { DateTime } from 'luxon';
import { createLogger } from '../../utils/observability/index.js';
import type { CalendarEvent } from '../calendar/types.js';

const log = createLogger({ domain: 'agenda-render' });

export const CHECKBOX = '- [ ]';
export const DATE_FORMAT = 'dd/MM/yyyy';

/**
 * Calendar date of a start instant, in the zone the event was written in.
 * Unknown zones fall back to UTC.
 */
export function formatStartDate(begin: Date, zone: string | null): string {
  if (zone !== null) {
    const local = DateTime.fromJSDate(begin, { zone });
    if (local.isValid) {
      return local.toFormat(DATE_FORMAT);
    }
    log.warn('unknown_time_zone', { zone, fallback: 'UTC' });
  }
  return DateTime.fromJSDate(begin, { zone: 'utc' }).toFormat(DATE_FORMAT);
}

/**
 * `- [ ] <name> <DD/MM/YYYY>`. The name is written as-is.
 */
export function renderChecklistLine(name: string, begin: Date, zone: string | null): string {
  return `${CHECKBOX} ${name} ${formatStartDate(begin, zone)}`;
}

export function renderEvent(event: CalendarEvent): string {
  return renderChecklistLine(event.name, event.begin, event.allDay ? null : event.zone);
}
