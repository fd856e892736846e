import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

/**
 * Weekly lottery calendar. Every boundary is a wall-clock time in the
 * lottery's civil zone, resolved through the IANA database rather than a
 * fixed offset. Inputs and outputs are plain instants (`Date`).
 *
 *   Sat 08:00  registration opens, week starts
 *   Wed 20:00  registration closes, winners drawn
 *   Thu 08:00  winner info deadline, incomplete winners cancelled
 */
export const LOTTERY_TIME_ZONE = 'Asia/Tehran';

const SATURDAY = 6;
const SUNDAY = 7;
const MONDAY = 1;
const TUESDAY = 2;
const WEDNESDAY = 3;
const THURSDAY = 4;

export const WEEK_START_HOUR = 8;
export const REGISTRATION_CLOSE_HOUR = 20;
export const COMPLETION_DEADLINE_HOUR = 8;

const DAY_MS = 24 * 60 * 60 * 1000;

interface LocalParts {
  date: string; // yyyy-MM-dd
  isoWeekday: number; // 1 = Monday ... 7 = Sunday
  hour: number;
}

function localParts(instant: Date): LocalParts {
  const [date, weekday, hour] = formatInTimeZone(instant, LOTTERY_TIME_ZONE, 'yyyy-MM-dd|i|H').split('|');
  return { date, isoWeekday: parseInt(weekday, 10), hour: parseInt(hour, 10) };
}

// Calendar-date arithmetic on a UTC noon anchor, independent of the host zone.
function shiftDate(date: string, days: number): string {
  const anchor = new Date(`${date}T12:00:00Z`);
  return formatInTimeZone(new Date(anchor.getTime() + days * DAY_MS), 'UTC', 'yyyy-MM-dd');
}

function atLocalHour(date: string, hour: number): Date {
  return fromZonedTime(`${date}T${hour.toString().padStart(2, '0')}:00:00`, LOTTERY_TIME_ZONE);
}

/**
 * Most recent Saturday 08:00 at or before `now`.
 */
export function registrationWeekStart(now: Date): Date {
  const { date, isoWeekday, hour } = localParts(now);

  let daysBack = (isoWeekday - SATURDAY + 7) % 7;
  if (daysBack === 0 && hour < WEEK_START_HOUR) {
    daysBack = 7;
  }

  return atLocalHour(shiftDate(date, -daysBack), WEEK_START_HOUR);
}

/**
 * Open from Saturday 08:00 up to (not including) Wednesday 20:00.
 */
export function isRegistrationOpen(now: Date): boolean {
  const { isoWeekday, hour } = localParts(now);

  switch (isoWeekday) {
    case SATURDAY:
      return hour >= WEEK_START_HOUR;
    case SUNDAY:
    case MONDAY:
    case TUESDAY:
      return true;
    case WEDNESDAY:
      return hour < REGISTRATION_CLOSE_HOUR;
    default:
      return false;
  }
}

/**
 * First Thursday 08:00 strictly after the ticket was created.
 */
export function completionDeadline(ticketCreatedAt: Date): Date {
  const { date, isoWeekday } = localParts(ticketCreatedAt);

  const daysAhead = (THURSDAY - isoWeekday + 7) % 7;
  const candidate = atLocalHour(shiftDate(date, daysAhead), COMPLETION_DEADLINE_HOUR);

  if (candidate.getTime() > ticketCreatedAt.getTime()) {
    return candidate;
  }
  return atLocalHour(shiftDate(date, daysAhead + 7), COMPLETION_DEADLINE_HOUR);
}

export function formatInLotteryZone(instant: Date): string {
  return formatInTimeZone(instant, LOTTERY_TIME_ZONE, 'yyyy-MM-dd HH:mm:ss zzz');
}
