// src/utils/time.ts

/** Dubai observes no DST, so a fixed offset is exact. */
export const DUBAI_UTC_OFFSET_HOURS = 4;

/** Calendar date (YYYY-MM-DD) in Dubai for the given instant, whatever the host TZ. */
export function dubaiDateISO(now: Date = new Date()): string {
  const shifted = new Date(now.getTime() + DUBAI_UTC_OFFSET_HOURS * 3_600_000);
  return shifted.toISOString().slice(0, 10);
}
