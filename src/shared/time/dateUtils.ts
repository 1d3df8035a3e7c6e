/**
 * Converts a Date to an ISO calendar date (YYYY-MM-DD).
 * Without a time zone the UTC date is used, so snapshot names do not depend on the host's locale.
 */
export const toIsoDate = (value: Date, timeZone?: string): string => {
  if (!timeZone) {
    return value.toISOString().slice(0, 10);
  }

  // en-CA formats dates as YYYY-MM-DD.
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(value);
};
