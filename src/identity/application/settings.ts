import { getNumber, getString } from "../../util/env";
import { DEFAULT_OUTPUT_DIR } from "../../report/report_paths";
import { assertTimeZone, DEFAULT_TIME_ZONE } from "../../report/timestamp";
import { DEFAULT_CONFIG_PATH } from "../business/load_config";
import { ConfigError, describeError } from "../domain/errors";
import {
  DEFAULT_TIMEOUT_MS,
  GITHUB_GRAPHQL_URL,
} from "../infrastructure/github_client";

/**
 * Runtime settings layered over the INI file; read from the environment.
 */
export interface RuntimeSettings {
  configPath: string;
  outputDir: string;
  timeZone: string;
  timeoutMs: number;
  endpoint: string;
}

export function resolveSettings(args: string[] = []): RuntimeSettings {
  try {
    const settings: RuntimeSettings = {
      configPath:
        args[0] ?? getString("SAML_REPORT_CONFIG", DEFAULT_CONFIG_PATH),
      outputDir: getString("SAML_REPORT_OUTPUT_DIR", DEFAULT_OUTPUT_DIR),
      timeZone: getString("SAML_REPORT_TIME_ZONE", DEFAULT_TIME_ZONE),
      timeoutMs: getNumber("SAML_REPORT_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
      endpoint: getString("GITHUB_GRAPHQL_URL", GITHUB_GRAPHQL_URL),
    };
    if (!Number.isSafeInteger(settings.timeoutMs) || settings.timeoutMs <= 0) {
      throw new Error(
        `SAML_REPORT_TIMEOUT_MS must be a positive whole number of milliseconds: ${settings.timeoutMs}`,
      );
    }
    assertTimeZone(settings.timeZone);
    return settings;
  } catch (err) {
    throw new ConfigError(`Invalid runtime settings: ${describeError(err)}`, {
      cause: err,
    });
  }
}
