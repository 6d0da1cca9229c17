import fs from 'fs';
import { fileURLToPath } from 'url';
import type { CalendarEvent } from '../../src/services/calendar/types.js';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

export function loadFixture(name: string): string {
  return fs.readFileSync(fixturePath(name), 'utf-8');
}

export function makeEvent(overrides: Partial<CalendarEvent> = {}): CalendarEvent {
  return {
    uid: 'event@example.test',
    name: 'Event',
    begin: new Date('2030-01-01T12:00:00Z'),
    zone: 'Etc/UTC',
    allDay: false,
    ...overrides,
  };
}
