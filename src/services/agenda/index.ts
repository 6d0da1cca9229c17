/**
 * @fileoverview Calendar filter-and-render: parse, keep upcoming, format.
 */

import type { AllDayPolicy } from '../../config.js';
import { parseCalendar } from '../calendar/parser.js';
import type { CalendarParser } from '../calendar/types.js';
import { createLogger } from '../../utils/observability/index.js';
import { selectUpcoming } from './filter.js';
import { renderEvent } from './render.js';

const log = createLogger({ domain: 'agenda' });

export type BuildAgendaOptions = {
  now: Date; // reference instant, events must start strictly after it
  allDayPolicy?: AllDayPolicy; // default: utc-midnight
  parse?: CalendarParser; // default: ical.js
};

/**
 * Checklist lines for every event starting after `now`, in document order.
 */
export function buildAgenda(text: string, options: BuildAgendaOptions): string[] {
  const parse = options.parse ?? parseCalendar;
  const allDayPolicy = options.allDayPolicy ?? 'utc-midnight';

  const events = parse(text);
  const upcoming = selectUpcoming(events, options.now, allDayPolicy);
  log.info('agenda_built', {
    now: options.now,
    events: events.length,
    upcoming: upcoming.length,
  });

  return upcoming.map(renderEvent);
}

export { isKnownZone, isUpcoming, selectUpcoming, startInstant } from './filter.js';
export { renderChecklistLine, renderEvent, formatStartDate } from './render.js';
