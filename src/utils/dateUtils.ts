import { differenceInMinutes, format, parseISO, subDays } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { LocalDate, TimeOfDay } from '../types/attendance/records';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function toLocalDate(instant: Date, timezone: string): LocalDate {
  return formatInTimeZone(instant, timezone, 'yyyy-MM-dd');
}

export function toLocalTime(instant: Date, timezone: string): TimeOfDay {
  return formatInTimeZone(instant, timezone, 'HH:mm');
}

/** Seconds since local midnight, in the given zone. */
export function secondsOfDay(instant: Date, timezone: string): number {
  const [hours, minutes, seconds] = formatInTimeZone(
    instant,
    timezone,
    'HH:mm:ss',
  )
    .split(':')
    .map(Number);
  return hours * 3600 + minutes * 60 + seconds;
}

export function minutesOfDay(instant: Date, timezone: string): number {
  return Math.floor(secondsOfDay(instant, timezone) / 60);
}

export function timeToMinutes(time: TimeOfDay): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

/** Calendar day before a yyyy-MM-dd date. */
export function previousLocalDate(date: LocalDate): LocalDate {
  return format(subDays(parseISO(date), 1), 'yyyy-MM-dd');
}

export function calculateTimeDifference(start: Date, end: Date): number {
  return differenceInMinutes(end, start);
}

export function formatDuration(totalMinutes: number): string {
  const safe = Math.max(0, Math.floor(totalMinutes));
  return `${Math.floor(safe / 60)}h ${safe % 60}m`;
}
