import { getLogger, type ReportLogger } from "../../util/logger";
import { loadConfig } from "../business/load_config";
import {
  ConfigError,
  describeError,
  EmptyResultError,
} from "../domain/errors";
import type { RunOutcome } from "../domain/types";
import type { IdentityProviderClient } from "../infrastructure/contracts";
import { createGitHubIdentityClient } from "../infrastructure/github_client";
import { runReport } from "./run_report";
import { resolveSettings } from "./settings";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface CliOptions {
  /** Replaces the GitHub client; receives the token from the config file */
  createClient?: (params: {
    token: string;
    endpoint: string;
    timeoutMs: number;
  }) => IdentityProviderClient;
  clock?: () => Date;
  logger?: ReportLogger;
}

/**
 * Runs one report and returns the process exit code.
 */
export async function runCli(
  args: string[],
  options: CliOptions = {},
): Promise<number> {
  const {
    createClient = createGitHubIdentityClient,
    clock,
    logger = getLogger("identity/cli"),
  } = options;

  try {
    const settings = resolveSettings(args);
    const config = await loadConfig(settings.configPath);

    const client = createClient({
      token: config.token,
      endpoint: settings.endpoint,
      timeoutMs: settings.timeoutMs,
    });

    const outcome: RunOutcome = await runReport({
      organizations: config.organizations,
      htmlHeader: config.htmlHeader,
      client,
      outputDir: settings.outputDir,
      timeZone: settings.timeZone,
      clock,
      logger,
    });

    if (outcome.status === "empty") {
      throw new EmptyResultError(config.organizations);
    }

    logger.info(
      { total: outcome.total, csvPath: outcome.csvPath, htmlPath: outcome.htmlPath },
      "All files generated successfully!",
    );
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(`Configuration error: ${err.message}`);
    } else if (err instanceof EmptyResultError) {
      logger.error(err.message);
    } else {
      logger.error({ err }, `Unexpected error: ${describeError(err)}`);
    }
    return EXIT_FAILURE;
  }
}
