const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Utility function to convert date to local ISO string format
 * This handles local timezone conversion automatically
 */
export function toLocalISOString(date = new Date()) {
  return (
    date.getFullYear() + "-" +
    pad(date.getMonth() + 1) + "-" +
    pad(date.getDate()) + "T" +
    pad(date.getHours()) + ":" +
    pad(date.getMinutes()) + ":" +
    pad(date.getSeconds()) + "." +
    String(date.getMilliseconds()).padStart(3, '0')
  );
}

export function getCurrentDate() {
  return new Date();
}

/** Local calendar day as `YYYY-MM-DD`, the format of the `date` columns. */
export function toDateString(date: Date = getCurrentDate()) {
  return toLocalISOString(date).slice(0, 10);
}

export function getToday() {
  return toDateString(getCurrentDate());
}

/**
 * Reduces a timestamp or a `YYYY-MM-DD` string to its local calendar day so
 * that dates and datetimes compare at day granularity.
 */
export function toDay(value: Date | string) {
  return value instanceof Date ? toDateString(value) : value.slice(0, 10);
}
