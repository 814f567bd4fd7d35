import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidDateError } from '../../packages/shared/errors';
import { addDays, daysInclusive, formatIsoDate, parseDateRange, parseIsoDate, weekdayName } from './dates';
import { DayClock, formatClock } from './clock';

describe('calendar helpers', () => {
  it('parses strict ISO dates as UTC days', () => {
    const date = parseIsoDate('2024-02-29');
    assert.equal(formatIsoDate(date), '2024-02-29');
    assert.equal(weekdayName(date), 'Thursday');
    assert.throws(() => parseIsoDate('2023-02-29'), InvalidDateError);
    assert.throws(() => parseIsoDate('2024-2-9'), InvalidDateError);
  });

  it('counts ranges inclusively across month ends', () => {
    const { start, end } = parseDateRange('2025-01-30', '2025-02-02');
    assert.equal(daysInclusive(start, end), 4);
    assert.equal(formatIsoDate(addDays(start, 3)), '2025-02-02');
  });

  it('accepts a single-day range and rejects a reversed one', () => {
    const { start, end } = parseDateRange('2025-05-05', '2025-05-05');
    assert.equal(daysInclusive(start, end), 1);
    assert.throws(() => parseDateRange('2025-05-06', '2025-05-05'), {
      message: 'End date 2025-05-05 is before start date 2025-05-06.',
    });
  });
});

describe('DayClock', () => {
  it('adds a break after each session and skips lunch', () => {
    const clock = new DayClock();
    assert.equal(formatClock(clock.place(60)), '08:00');
    assert.equal(formatClock(clock.place(60)), '09:15');
    assert.equal(formatClock(clock.place(60)), '10:30');
    // 11:45 + 60 would run into lunch
    assert.equal(formatClock(clock.place(60)), '13:00');
    assert.equal(formatClock(clock.now), '14:15');
  });

  it('lets a session end exactly at noon', () => {
    const clock = new DayClock(11 * 60);
    assert.equal(formatClock(clock.place(60)), '11:00');
    assert.equal(formatClock(clock.place(15)), '13:00');
  });
});
