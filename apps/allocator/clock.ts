export const DAY_START_MINUTE = 8 * 60;
export const LUNCH_START_MINUTE = 12 * 60;
export const LUNCH_END_MINUTE = 13 * 60;
export const BREAK_MINUTES = 15;
export const MIN_SESSION_MINUTES = 15;

export function formatClock(minute: number): string {
  const hours = Math.floor(minute / 60);
  const minutes = minute % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Wall clock for one study day. Sessions never start inside the lunch break
 * and never run across it; a 15 minute break follows every session.
 */
export class DayClock {
  private minute: number;

  constructor(startMinute = DAY_START_MINUTE) {
    this.minute = startMinute;
  }

  get now() {
    return this.minute;
  }

  /** Reserves `minutes` and returns the session's start minute. */
  place(minutes: number): number {
    let start = this.minute;
    const overlapsLunch = start < LUNCH_END_MINUTE && start + minutes > LUNCH_START_MINUTE;
    if (overlapsLunch) {
      start = LUNCH_END_MINUTE;
    }
    this.minute = start + minutes + BREAK_MINUTES;
    return start;
  }
}
