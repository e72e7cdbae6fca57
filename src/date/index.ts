const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

const MONTH_MAP = new Map<string, number>(
  MONTHS.map((m, index) => [m, index]),
);

const MONTH = '(?<month>Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)';
const TIME = '(?<hour>\\d{2}):(?<min>\\d{2}):(?<sec>\\d{2})';

// IMF-fixdate, obsolete RFC 850 and asctime() forms
const HTTP_DATE_PATTERNS = [
  new RegExp(`^(?:Sun|Mon|Tue|Wed|Thu|Fri|Sat), (?<day>\\d{2}) ${MONTH} (?<year>\\d{4}) ${TIME} GMT$`),
  new RegExp(`^(?:Sunday|Monday|Tuesday|Wednesday|Thursday|Friday|Saturday), (?<day>\\d{2})-${MONTH}-(?<shortYear>\\d{2}) ${TIME} GMT$`),
  new RegExp(`^(?:Sun|Mon|Tue|Wed|Thu|Fri|Sat) ${MONTH} {1,2}(?<day>\\d{1,2}) ${TIME} (?<year>\\d{4})$`),
] as const;

function buildUtcDate(
  year: number,
  month: number,
  day: number,
  hour: number,
  min: number,
  sec: number,
): Date | null {
  const d = new Date(Date.UTC(year, month, day, hour, min, sec));
  if (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month &&
    d.getUTCDate() === day &&
    d.getUTCHours() === hour &&
    d.getUTCMinutes() === min &&
    d.getUTCSeconds() === sec
  ) {
    return d;
  }
  return null;
}

function resolveYear(groups: Record<string, string | undefined>): number {
  if (groups.year !== undefined) {
    return Number(groups.year);
  }
  // two-digit years pivot at 1970
  const year = Number(groups.shortYear);
  return year + (year >= 70 ? 1900 : 2000);
}

/**
 * Parses the three HTTP-date forms of RFC 9110 section 5.6.7. Returns `null`
 * for anything else, including dates that do not exist such as 30 Feb.
 */
export function parseHttpDate(value: string): Date | null {
  if (value.length < 24 || value.length > 40) {
    return null;
  }
  for (const pattern of HTTP_DATE_PATTERNS) {
    const groups = pattern.exec(value)?.groups;
    if (groups) {
      const month = groups.month === undefined ? undefined : MONTH_MAP.get(groups.month);
      if (month === undefined) {
        return null;
      }
      return buildUtcDate(
        resolveYear(groups),
        month,
        Number(groups.day),
        Number(groups.hour),
        Number(groups.min),
        Number(groups.sec),
      );
    }
  }
  return null;
}
