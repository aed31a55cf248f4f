/**
 * Deadline input parsing.
 *
 * Day expressions resolve to a local calendar day: today, tomorrow,
 * yesterday, offsets (+3d, +2w, +1m), weekday names (fri, friday),
 * month + day (mar15) and yyyy-MM-dd.
 */

const OFFSET_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^([a-z]{3})(\d{1,2})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
/** Anything with a time component: 2026-03-01T10:00, 2026-03-01T10:00:00Z, ... */
const ISO_DATETIME_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;

const NAMED_OFFSETS: Record<string, number> = { today: 0, tomorrow: 1, yesterday: -1 };

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

type DayResolver = (input: string, today: Date) => Date | null;

function shift(day: Date, days: number, months = 0): Date {
  return new Date(day.getFullYear(), day.getMonth() + months, day.getDate() + days);
}

/** Local calendar date, or null when the parts roll over (feb30, month 13) */
function calendarDay(year: number, monthIndex: number, day: number): Date | null {
  const d = new Date(year, monthIndex, day);
  return d.getFullYear() === year && d.getMonth() === monthIndex && d.getDate() === day ? d : null;
}

const resolveNamed: DayResolver = (input, today) => {
  const offset = NAMED_OFFSETS[input];
  return offset === undefined ? null : shift(today, offset);
};

const resolveOffset: DayResolver = (input, today) => {
  const m = OFFSET_RE.exec(input);
  if (!m?.[1]) return null;

  const n = Number(m[1]);
  if (m[2] === 'w') return shift(today, n * 7);
  if (m[2] === 'm') return shift(today, 0, n);
  return shift(today, n);
};

/** Next occurrence; naming today's weekday means a week from now */
const resolveWeekday: DayResolver = (input, today) => {
  const target = WEEKDAYS.findIndex(name => name === input || name.slice(0, 3) === input);
  if (target < 0) return null;

  const ahead = (target - today.getDay() + 7) % 7 || 7;
  return shift(today, ahead);
};

/** Rolls over to next year once the day has passed */
const resolveMonthDay: DayResolver = (input, today) => {
  const m = MONTH_DAY_RE.exec(input);
  if (!m?.[1] || !m[2]) return null;

  const month = MONTHS.indexOf(m[1]);
  if (month < 0) return null;

  const day = Number(m[2]);
  const thisYear = calendarDay(today.getFullYear(), month, day);
  if (!thisYear) return null;
  return thisYear.getTime() < today.getTime() ? calendarDay(today.getFullYear() + 1, month, day) : thisYear;
};

const resolveIsoDate: DayResolver = (input) => {
  const m = ISO_DATE_RE.exec(input);
  if (!m?.[1] || !m[2] || !m[3]) return null;
  return calendarDay(Number(m[1]), Number(m[2]) - 1, Number(m[3]));
};

const RESOLVERS: readonly DayResolver[] = [resolveNamed, resolveOffset, resolveWeekday, resolveMonthDay, resolveIsoDate];

function resolveDay(input: string, now: Date): Date | null {
  const today = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const normalized = input.trim().toLowerCase();
  for (const resolve of RESOLVERS) {
    const day = resolve(normalized, today);
    if (day) return day;
  }
  return null;
}

function toDateString(d: Date): string {
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${m}-${day}`;
}

/**
 * Parse a day expression into yyyy-MM-dd, or null if it can't be read.
 *
 * @param now - Reference "today"; defaults to the current date
 */
export function parseDate(input: string | null | undefined, now: Date = new Date()): string | null {
  if (!input?.trim()) return null;
  const day = resolveDay(input, now);
  return day ? toDateString(day) : null;
}

/**
 * Turn user input into a deadline timestamp (ISO string).
 * Full timestamps pass through; day expressions become the last millisecond
 * of that day in local time. Returns null if the input can't be parsed.
 */
export function toDeadline(input: string | null | undefined, now: Date = new Date()): string | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;

  if (ISO_DATETIME_RE.test(trimmed)) {
    const d = new Date(trimmed);
    return isNaN(d.getTime()) ? null : d.toISOString();
  }

  const day = resolveDay(trimmed, now);
  if (!day) return null;
  day.setHours(23, 59, 59, 999);
  return day.toISOString();
}
