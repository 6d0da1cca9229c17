import { DateTime } from 'luxon';
import type { AllDayPolicy } from '../../config.js';
import { ComparisonError } from '../../utils/errors.js';
import type { CalendarEvent } from '../calendar/types.js';

/** True when Luxon can resolve the zone (IANA name or fixed offset). */
export function isKnownZone(zone: string): boolean {
  return DateTime.local().setZone(zone).isValid;
}

/**
 * The instant an event starts, as compared with `now`.
 *
 * All-day starts are already midnight UTC of their date and pass under the
 * `utc-midnight` policy. Floating starts and starts in a zone that cannot
 * be resolved have no instant at all.
 */
export function startInstant(event: CalendarEvent, allDayPolicy: AllDayPolicy): Date {
  if (event.allDay) {
    if (allDayPolicy === 'reject') {
      throw new ComparisonError(`Event "${event.name}" has a date-only start`, { uid: event.uid });
    }
    return event.begin;
  }

  if (event.zone === null) {
    throw new ComparisonError(
      `Event "${event.name}" has a floating start with no time zone`,
      { uid: event.uid }
    );
  }

  if (!isKnownZone(event.zone)) {
    throw new ComparisonError(
      `Event "${event.name}" starts in unknown time zone ${event.zone}`,
      { uid: event.uid, zone: event.zone }
    );
  }

  return event.begin;
}

/** True iff the event starts strictly after `now`. */
export function isUpcoming(event: CalendarEvent, now: Date, allDayPolicy: AllDayPolicy): boolean {
  return startInstant(event, allDayPolicy).getTime() > now.getTime();
}

/** Upcoming events, in their original order. */
export function selectUpcoming(
  events: readonly CalendarEvent[],
  now: Date,
  allDayPolicy: AllDayPolicy
): CalendarEvent[] {
  return events.filter((event) => isUpcoming(event, now, allDayPolicy));
}
