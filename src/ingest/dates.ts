interface DateFormat {
  pattern: RegExp;
  toParts(match: RegExpMatchArray): { year: number; month: number; day: number };
}

function expandTwoDigitYear(year: number): number {
  return year < 69 ? 2000 + year : 1900 + year;
}

// Tried in order; the first one that yields a calendar date wins.
const ACCEPTED_FORMATS: DateFormat[] = [
  {
    // day/month/year
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
    toParts: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: Number(m[3]) }),
  },
  {
    // year-month-day
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    toParts: (m) => ({ year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) }),
  },
  {
    // day-month-year
    pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/,
    toParts: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: Number(m[3]) }),
  },
  {
    // day/month/yy
    pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/,
    toParts: (m) => ({ day: Number(m[1]), month: Number(m[2]), year: expandTwoDigitYear(Number(m[3])) }),
  },
];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  const lastDay = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  return day <= lastDay;
}

/**
 * Normalises a listing date to `YYYY-MM-DD 00:00:00`. Returns null for empty or
 * unrecognised text.
 */
export function normalizeDate(raw: string | null | undefined): string | null {
  const value = raw?.trim();
  if (!value) {
    return null;
  }

  for (const format of ACCEPTED_FORMATS) {
    const match = value.match(format.pattern);
    if (!match) {
      continue;
    }
    const { year, month, day } = format.toParts(match);
    if (isCalendarDate(year, month, day)) {
      return `${pad(year, 4)}-${pad(month)}-${pad(day)} 00:00:00`;
    }
  }

  return null;
}

/** `YYYY-MM-DD HH:MM:SS` of the given instant in UTC. */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}
