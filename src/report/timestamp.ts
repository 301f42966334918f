import type { ReportTimestamp } from "../identity/domain/types";

export const DEFAULT_TIME_ZONE = "US/Eastern";

/**
 * Throws RangeError when `timeZone` is not a zone the runtime knows.
 */
export function assertTimeZone(timeZone: string): void {
  new Intl.DateTimeFormat("en-US", { timeZone });
}

/**
 * Renders one instant in `timeZone` as the report's display and file-name stamps.
 */
export function formatReportTimestamp(
  instant: Date,
  timeZone: string = DEFAULT_TIME_ZONE,
): ReportTimestamp {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });

  let year = "";
  let month = "";
  let day = "";
  let hour = "";
  let minute = "";
  let second = "";
  for (const { type, value } of formatter.formatToParts(instant)) {
    switch (type) {
      case "year":
        year = value;
        break;
      case "month":
        month = value;
        break;
      case "day":
        day = value;
        break;
      case "hour":
        hour = value;
        break;
      case "minute":
        minute = value;
        break;
      case "second":
        second = value;
        break;
    }
  }

  return {
    display: `${month}-${day}-${year} ${hour}:${minute}:${second}`,
    file: `${year}-${month}-${day}_${hour}${minute}${second}`,
  };
}
