import moment from 'moment';

/**
 * Day of year (1–366) for a YYYY-MM-DD or ISO date string.
 * Missing or unparseable dates fall back to 1.
 */
export const getDayOfYear = (date?: string | null): number => {
  if (!date) {
    return 1;
  }

  const parsed = moment(date, moment.ISO_8601, true);
  return parsed.isValid() ? parsed.dayOfYear() : 1;
};

/**
 * Parse an ISO-like date or timestamp ("2025-01-14", "2025-01-14T06:30:00Z", "2025-01-14 06:30:00")
 * to epoch milliseconds. Returns null for anything that is not valid ISO 8601.
 */
export const parseDate = (date: string): number | null => {
  const parsed = moment(date, moment.ISO_8601, true);
  return parsed.isValid() ? parsed.valueOf() : null;
};
