function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYY-MM-DD` in UTC. */
export function formatUtcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD` in the local time zone. */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** `YYYYMMDD` in the local time zone. */
export function formatLocalDateStamp(date: Date): string {
  return formatLocalDate(date).replaceAll("-", "");
}
