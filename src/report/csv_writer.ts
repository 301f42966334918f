import { writeFile } from "node:fs/promises";
import { stringify } from "csv-stringify/sync";
import type { UserRecord } from "../identity/domain/types";

export const CSV_COLUMNS = [
  { key: "organization", header: "Organization" },
  { key: "username", header: "Username" },
  { key: "email", header: "Email Address" },
] as const;

/**
 * Renders records as CSV with a fixed header row and CRLF line endings.
 */
export function renderCsv(users: readonly UserRecord[]): string {
  return stringify([...users], {
    header: true,
    columns: [...CSV_COLUMNS],
    record_delimiter: "windows",
    // a bare LF or CR would otherwise split the record
    quoted_match: /[\r\n]/,
  });
}

export async function writeCsv(
  users: readonly UserRecord[],
  filename: string,
): Promise<void> {
  await writeFile(filename, renderCsv(users), "utf-8");
}
