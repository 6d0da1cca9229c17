import { describe, it, expect } from 'vitest';
import {
  formatStartDate,
  renderChecklistLine,
  renderEvent,
} from '../../../src/services/agenda/render.js';
import { makeEvent } from '../../helpers/fixtures.js';

describe('renderChecklistLine', () => {
  it('writes the checkbox, name and zero-padded date', () => {
    expect(renderChecklistLine('Dentist', new Date('2025-03-05T14:30:00Z'), 'Etc/UTC')).toBe(
      '- [ ] Dentist 05/03/2025'
    );
  });

  it('leaves markdown in the name untouched', () => {
    expect(renderChecklistLine('*Ship* [v2] _now_', new Date('2030-12-31T23:59:59Z'), 'Etc/UTC')).toBe(
      '- [ ] *Ship* [v2] _now_ 31/12/2030'
    );
  });

  it('depends only on name and date', () => {
    const first = makeEvent({ uid: 'one', name: 'Sync', begin: new Date('2030-02-01T08:00:00Z') });
    const second = makeEvent({ uid: 'two', name: 'Sync', begin: new Date('2030-02-01T17:45:00Z') });

    expect(renderEvent(first)).toBe(renderEvent(second));
    expect(renderEvent(first)).toBe('- [ ] Sync 01/02/2030');
  });
});

describe('formatStartDate', () => {
  it('uses the calendar date of the event zone', () => {
    // 03:30Z on the 11th is still the 10th in New York
    expect(formatStartDate(new Date('2030-03-11T03:30:00Z'), 'America/New_York')).toBe('10/03/2030');
  });

  it('falls back to UTC for floating and unknown zones', () => {
    const begin = new Date('2030-03-11T03:30:00Z');

    expect(formatStartDate(begin, null)).toBe('11/03/2030');
    expect(formatStartDate(begin, 'Not/AZone')).toBe('11/03/2030');
  });

  it('renders all-day events on their calendar date', () => {
    const event = makeEvent({ name: 'Holiday', begin: new Date('2030-07-04T00:00:00Z'), zone: 'Pacific/Kiritimati', allDay: true });

    expect(renderEvent(event)).toBe('- [ ] Holiday 04/07/2030');
  });
});
