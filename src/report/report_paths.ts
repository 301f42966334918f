import path from "node:path";
import type { ReportTimestamp } from "../identity/domain/types";

export const REPORT_FILE_PREFIX = "saml_users_";
export const DEFAULT_OUTPUT_DIR = "Reports";

export function reportFileNames(timestamp: ReportTimestamp): {
  csvName: string;
  htmlName: string;
} {
  const stem = `${REPORT_FILE_PREFIX}${timestamp.file}`;
  return { csvName: `${stem}.csv`, htmlName: `${stem}.html` };
}

export function reportPaths(
  outputDir: string,
  timestamp: ReportTimestamp,
): { csvPath: string; htmlPath: string } {
  const { csvName, htmlName } = reportFileNames(timestamp);
  return {
    csvPath: path.join(outputDir, csvName),
    htmlPath: path.join(outputDir, htmlName),
  };
}

export function buildReportTitle(
  htmlHeader: string,
  organizations: readonly string[],
): string {
  return [htmlHeader, organizations.join(", "), "with SSO account information"]
    .filter((part) => part.length > 0)
    .join(" ");
}
