/**
 * Calendar helpers. All formatting uses the local time zone, the way an operator reads dates.
 */

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** YYYY-MM-DD */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Same wall-clock day shifted by whole calendar days (month and year roll over) */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** Pickup is requested for the day after the run */
export function nextCollectionDate(now: Date): string {
  return formatDate(addDays(now, 1));
}
