import { mkdir } from "node:fs/promises";
import { getLogger, type ReportLogger } from "../../util/logger";
import { writeCsv } from "../../report/csv_writer";
import { writeHtml } from "../../report/html_writer";
import {
  buildReportTitle,
  DEFAULT_OUTPUT_DIR,
  reportPaths,
} from "../../report/report_paths";
import {
  DEFAULT_TIME_ZONE,
  formatReportTimestamp,
} from "../../report/timestamp";
import { extractUsers } from "../business/extract_users";
import { describeError, TransportError } from "../domain/errors";
import type {
  OrganizationResult,
  RunOutcome,
  UserRecord,
} from "../domain/types";
import type { IdentityProviderClient } from "../infrastructure/contracts";

export const EMPTY_RESULT_HINTS = [
  "API token has correct permissions",
  "Organizations have SAML enabled",
  "Organization names are correct",
];

export interface RunReportInput {
  organizations: string[];
  htmlHeader: string;
  client: IdentityProviderClient;
  outputDir?: string;
  timeZone?: string;
  clock?: () => Date;
  logger?: ReportLogger;
}

/**
 * Queries every organization in turn, then writes the CSV and HTML reports.
 * A failing organization is logged and skipped; returns `empty` without
 * touching the filesystem when no organization produced any user.
 */
export async function runReport(input: RunReportInput): Promise<RunOutcome> {
  const {
    organizations,
    htmlHeader,
    client,
    outputDir = DEFAULT_OUTPUT_DIR,
    timeZone = DEFAULT_TIME_ZONE,
    clock = () => new Date(),
    logger = getLogger("identity/run_report"),
  } = input;

  logger.info(
    { organizations },
    `Querying ${organizations.length} organization(s)...`,
  );

  const allUsers: UserRecord[] = [];
  const perOrganization: OrganizationResult[] = [];

  for (const organization of organizations) {
    logger.info({ organization }, `Fetching users from ${organization}...`);
    try {
      const response = await client.fetchExternalIdentities(organization);
      const users = extractUsers(response, organization, logger);
      allUsers.push(...users);
      perOrganization.push({ organization, ok: true, count: users.length });
      logger.info(
        { organization, count: users.length },
        `Found ${users.length} users`,
      );
    } catch (err) {
      const message = describeError(err);
      perOrganization.push({ organization, ok: false, error: message });
      if (err instanceof TransportError) {
        logger.error(
          { organization, status: err.status },
          `Error fetching data: ${message}`,
        );
      } else {
        logger.error({ organization, err }, `Unexpected error: ${message}`);
      }
    }
  }

  if (allUsers.length === 0) {
    logger.error(
      { hints: EMPTY_RESULT_HINTS },
      `No users found. Please check: ${EMPTY_RESULT_HINTS.join("; ")}`,
    );
    return { status: "empty", perOrganization };
  }

  logger.info({ total: allUsers.length }, `${allUsers.length} total users found`);

  await mkdir(outputDir, { recursive: true });
  logger.info({ outputDir }, `Reports directory ready: ${outputDir}`);

  const timestamp = formatReportTimestamp(clock(), timeZone);
  const { csvPath, htmlPath } = reportPaths(outputDir, timestamp);

  await writeCsv(allUsers, csvPath);
  logger.info(
    { csvPath, count: allUsers.length },
    `CSV file created: ${csvPath} (${allUsers.length} users)`,
  );

  await writeHtml(
    {
      users: allUsers,
      title: buildReportTitle(htmlHeader, organizations),
      timestamp,
    },
    htmlPath,
  );
  logger.info({ htmlPath }, `HTML file created: ${htmlPath}`);

  return {
    status: "ok",
    total: allUsers.length,
    csvPath,
    htmlPath,
    perOrganization,
  };
}
