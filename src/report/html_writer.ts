import { writeFile } from "node:fs/promises";
import type {
  ReportTimestamp,
  UserRecord,
} from "../identity/domain/types";
import { renderPage } from "./html_template";
import { reportFileNames } from "./report_paths";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(input: string): string {
  return input.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function renderRow(user: UserRecord): string {
  const cells = [user.organization, user.username, user.email]
    .map((value) => `<td>${escapeHtml(value)}</td>`)
    .join("");
  return `                <tr>${cells}</tr>`;
}

export interface HtmlReportInput {
  users: readonly UserRecord[];
  title: string;
  timestamp: ReportTimestamp;
}

/**
 * Renders the sortable HTML table page; all record fields and the title are escaped.
 */
export function renderHtml(input: HtmlReportInput): string {
  const { users, title, timestamp } = input;
  const { csvName, htmlName } = reportFileNames(timestamp);
  return renderPage({
    title: escapeHtml(title),
    count: users.length,
    rows: users.map(renderRow).join("\n"),
    displayTimestamp: escapeHtml(timestamp.display),
    csvName: escapeHtml(csvName),
    htmlName: escapeHtml(htmlName),
  });
}

export async function writeHtml(
  input: HtmlReportInput,
  filename: string,
): Promise<void> {
  await writeFile(filename, renderHtml(input), "utf-8");
}
