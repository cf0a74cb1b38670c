export const TimeUnit = {
  NANOSECONDS: 'nanoseconds',
  MICROSECONDS: 'microseconds',
  MILLISECONDS: 'milliseconds',
  SECONDS: 'seconds',
  MINUTES: 'minutes',
  HOURS: 'hours',
  DAYS: 'days',
} as const;

export type TimeUnit = (typeof TimeUnit)[keyof typeof TimeUnit];

export const TIME_UNITS = [
  TimeUnit.NANOSECONDS,
  TimeUnit.MICROSECONDS,
  TimeUnit.MILLISECONDS,
  TimeUnit.SECONDS,
  TimeUnit.MINUTES,
  TimeUnit.HOURS,
  TimeUnit.DAYS,
] as const;

const NANOS_PER_UNIT: Record<TimeUnit, number> = {
  nanoseconds: 1,
  microseconds: 1e3,
  milliseconds: 1e6,
  seconds: 1e9,
  minutes: 60e9,
  hours: 3600e9,
  days: 86400e9,
};

export function nanosPer(unit: TimeUnit): number {
  return NANOS_PER_UNIT[unit];
}

export function secondsPer(unit: TimeUnit): number {
  return NANOS_PER_UNIT[unit] / 1e9;
}

/** "seconds" -> "second", as used in "events/second". */
export function singularName(unit: TimeUnit): string {
  return unit.slice(0, -1);
}
