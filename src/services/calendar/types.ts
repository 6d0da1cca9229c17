/**
 * @fileoverview Calendar event types shared by the parser and the agenda.
 */

/**
 * One VEVENT, reduced to what the agenda reads.
 */
export interface CalendarEvent {
  uid: string;
  name: string; // SUMMARY, '' when absent
  begin: Date; // DTSTART read in `zone`; UTC midnight for all-day starts
  zone: string | null; // TZID (or Etc/UTC for Z times) as written, null for floating and all-day starts
  allDay: boolean; // DTSTART;VALUE=DATE
}

/**
 * Parses raw calendar text into events, in document order.
 */
export type CalendarParser = (text: string) => CalendarEvent[];
