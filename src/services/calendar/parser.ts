/**
 * @fileoverview iCalendar parsing on top of ical.js.
 *
 * ical.js owns the RFC 5545 grammar. This module only checks that the
 * text is a calendar at all and maps each VEVENT, in document order, to a
 * {@link CalendarEvent}. Start instants are built with Luxon from the
 * DTSTART wall clock and its TZID, never from the host time zone.
 */

import ICAL from 'ical.js';
import { DateTime } from 'luxon';
import { ParseError } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import type { CalendarEvent } from './types.js';

type IcalComponent = InstanceType<typeof ICAL.Component>;
type IcalTime = InstanceType<typeof ICAL.Time>;

const log = createLogger({ domain: 'calendar-parser' });

const VCALENDAR_START = /^\uFEFF?BEGIN:VCALENDAR[ \t]*\r?$/m;
const UTC_ZONE = 'Etc/UTC';

function textOf(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Zone the start was written in: its TZID, UTC for `Z` times, null when
 * floating or date-only.
 */
function zoneOf(tzid: unknown, start: IcalTime): string | null {
  if (start.isDate) return null;
  if (typeof tzid === 'string' && tzid.trim().length > 0) return tzid.trim();
  if (start.zone?.tzid === 'UTC') return UTC_ZONE;
  return null;
}

/**
 * The DTSTART wall clock read in `zone`. Floating, date-only and unknown
 * zones are read as UTC; the agenda filter refuses the first and last.
 */
function instantOf(start: IcalTime, zone: string | null): Date {
  const wallClock = {
    year: start.year,
    month: start.month,
    day: start.day,
    hour: start.isDate ? 0 : start.hour,
    minute: start.isDate ? 0 : start.minute,
    second: start.isDate ? 0 : start.second,
  };
  const zoned = DateTime.fromObject(wallClock, { zone: zone ?? 'utc' });
  if (zoned.isValid) return zoned.toJSDate();
  return DateTime.fromObject(wallClock, { zone: 'utc' }).toJSDate();
}

function toCalendarEvent(vevent: IcalComponent, index: number): CalendarEvent | null {
  const uid = textOf(vevent.getFirstPropertyValue('uid')) || `event-${index + 1}`;
  const dtstart = vevent.getFirstProperty('dtstart');
  const start: unknown = dtstart?.getFirstValue();
  if (!dtstart || !(start instanceof ICAL.Time)) {
    log.debug('event_skipped_without_start', { uid });
    return null;
  }

  const zone = zoneOf(dtstart.getParameter('tzid'), start);
  return {
    uid,
    name: textOf(vevent.getFirstPropertyValue('summary')),
    begin: instantOf(start, zone),
    zone,
    allDay: start.isDate,
  };
}

function parseRoot(text: string): IcalComponent {
  try {
    return new ICAL.Component(ICAL.parse(text));
  } catch (error) {
    throw new ParseError(
      `Invalid calendar: ${error instanceof Error ? error.message : String(error)}`,
      { length: text.length }
    );
  }
}

/**
 * Parse calendar text into its events, in document order.
 *
 * @throws ParseError when the text is not an iCalendar document or ical.js rejects it
 */
export function parseCalendar(text: string): CalendarEvent[] {
  if (!VCALENDAR_START.test(text)) {
    throw new ParseError('Calendar text has no BEGIN:VCALENDAR line', { length: text.length });
  }

  const vevents = parseRoot(text).getAllSubcomponents('vevent');
  const events: CalendarEvent[] = [];
  vevents.forEach((vevent, index) => {
    const event = toCalendarEvent(vevent, index);
    if (event) events.push(event);
  });

  log.debug('calendar_parsed', { components: vevents.length, events: events.length });
  return events;
}
