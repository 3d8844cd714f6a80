import { startOfDay, endOfDay, subDays, subMonths } from "date-fns";
import { formatInTimeZone, fromZonedTime, toZonedTime } from "date-fns-tz";
import { ReportPeriod } from "./types";

// format a JS Date into readable string in TZ
export function fmtDate(d: Date, timeZone: string) {
  return formatInTimeZone(d, timeZone, "yyyy-MM-dd HH:mm");
}

// report ranges are UTC calendar days, so entry dates are printed in UTC too
export function fmtDay(d: Date) {
  return formatInTimeZone(d, "UTC", "yyyy-MM-dd");
}

// window boundaries are midnights in the given zone, returned as UTC instants
export function getRange(
  period: ReportPeriod,
  timeZone: string,
  now: Date = new Date(),
) {
  const zoned = toZonedTime(now, timeZone);
  const from = period === "weekly" ? subDays(zoned, 7) : subMonths(zoned, 1);
  return {
    start: fromZonedTime(startOfDay(from), timeZone),
    end: fromZonedTime(endOfDay(zoned), timeZone),
  };
}

export function fmtAmount(a: number) {
  return a.toFixed(2);
}

export function fmtSigned(income: number, expense: number, net: number) {
  return `+${fmtAmount(income)} -${fmtAmount(expense)} = ${fmtAmount(net)}`;
}
