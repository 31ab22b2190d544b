import { formatInTimeZone } from "date-fns-tz";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss xxx";

export function formatTimestamp(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, TIMESTAMP_FORMAT);
}
