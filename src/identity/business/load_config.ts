import { readFile } from "node:fs/promises";
import { parse } from "ini";
import { z } from "zod";
import { ConfigError, describeError } from "../domain/errors";
import type { AppConfig } from "../domain/types";

export const DEFAULT_CONFIG_PATH = "./config.ini";
export const CONFIG_SECTION = "configuration";

const SECTION_HEADER = /^\s*\[([^\]]*)\]\s*$/;
const KEY_VALUE = /^\s*([^=:\s][^=:]*?)\s*[=:]\s*(.*?)\s*$/;

const requiredText = (key: string) =>
  z
    .string({
      required_error: `missing key "${key}"`,
      invalid_type_error: `key "${key}" must be text`,
    })
    .trim()
    .min(1, `key "${key}" is blank`);

const configFileSchema = z.object(
  {
    configuration: z.object(
      {
        github_api_token: requiredText("github_api_token"),
        github_org: requiredText("github_org"),
        html_header: z
          .string({
            required_error: `missing key "HTML_HEADER"`,
            invalid_type_error: `key "HTML_HEADER" must be text`,
          })
          .trim(),
      },
      {
        required_error: "missing [configuration] section",
        invalid_type_error: "[configuration] must be a section",
      },
    ),
  },
  { invalid_type_error: "file is not an INI document" },
);

export function splitOrganizations(raw: string): string[] {
  return raw
    .split(",")
    .map((org) => org.trim())
    .filter((org) => org.length > 0);
}

/**
 * Raw `key = value` (or `key: value`) pairs of one section, keys lower-cased.
 * Values are kept verbatim: `#` and `;` only start a comment at the
 * beginning of a line, and `true`/`null` stay text.
 */
export function readSectionValues(
  text: string,
  sectionName: string,
): Record<string, string> {
  const values: Record<string, string> = {};
  let current: string | undefined;
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith(";"))
      continue;
    const header = SECTION_HEADER.exec(line);
    if (header) {
      current = header[1];
      continue;
    }
    if (current !== sectionName) continue;
    const pair = KEY_VALUE.exec(line);
    if (pair) values[pair[1].toLowerCase()] = pair[2];
  }
  return values;
}

/**
 * Parses INI text into the report configuration.
 * `source` only labels error messages.
 */
export function parseConfig(text: string, source: string): AppConfig {
  let document: unknown;
  try {
    const sections = parse(text);
    const section: unknown = sections[CONFIG_SECTION];
    document =
      typeof section === "object" && section !== null
        ? { [CONFIG_SECTION]: readSectionValues(text, CONFIG_SECTION) }
        : { [CONFIG_SECTION]: section };
  } catch (err) {
    throw new ConfigError(`Cannot parse ${source}: ${describeError(err)}`, {
      cause: err,
    });
  }

  const parsed = configFileSchema.safeParse(document);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.message);
    throw new ConfigError(
      `Configuration error in ${source}: ${problems.join("; ")}`,
    );
  }

  const section = parsed.data.configuration;
  const organizations = splitOrganizations(section.github_org);
  if (organizations.length === 0) {
    throw new ConfigError(
      `Configuration error in ${source}: key "github_org" lists no organizations`,
    );
  }

  return {
    token: section.github_api_token,
    organizations,
    htmlHeader: section.html_header,
  };
}

export async function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (err) {
    const code =
      err instanceof Error && "code" in err ? String(err.code) : undefined;
    if (code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${configPath}`, {
        cause: err,
      });
    }
    throw new ConfigError(
      `Cannot read config file ${configPath}: ${describeError(err)}`,
      { cause: err },
    );
  }
  return parseConfig(text, configPath);
}
