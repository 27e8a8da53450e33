const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

export const WORKDAY_START_HOUR = 6;
export const WORKDAY_END_HOUR = 18;

export interface LocalTime {
  /** 0 = Sunday */
  weekday: number;
  hour: number;
}

/** Weekday and 24h hour of `now` in `timeZone`, or the process zone when omitted. */
export function localTime(now: Date, timeZone?: string): LocalTime {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'short',
    hour: 'numeric',
    hourCycle: 'h23',
  }).formatToParts(now);
  const weekdayName = parts.find((p) => p.type === 'weekday')?.value;
  const hour = Number(parts.find((p) => p.type === 'hour')?.value);
  const weekday = WEEKDAYS.findIndex((d) => d === weekdayName);
  if (weekday === -1 || Number.isNaN(hour)) {
    throw new RangeError(`Cannot resolve local time for ${now.toISOString()} in ${timeZone}`);
  }
  return { weekday, hour };
}

/**
 * After hours: Saturday, Sunday, and outside [06:00, 18:00) on weekdays.
 */
export function isSuppressed(now: Date, timeZone?: string): boolean {
  const { weekday, hour } = localTime(now, timeZone);
  const weekend = weekday === 0 || weekday === 6;
  return weekend || hour >= WORKDAY_END_HOUR || hour < WORKDAY_START_HOUR;
}
