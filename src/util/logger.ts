import pino, { Logger, LoggerOptions } from "pino";
import { getBoolean, getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for the report CLI.
 * - Interactive terminal: pretty-printed logs for readability
 * - CI / scheduled runs: JSON logs for collection
 */
const baseOptions: LoggerOptions = {
  level:
    process.env.LOG_LEVEL ||
    (isTest() ? "silent" : isProduction() ? "info" : "debug"),
  base: {
    service: "saml-identity-report",
    stage: getStage(),
  },
  redact: {
    // Remove credentials from logs
    paths: [
      "token",
      "*.token",
      "github_api_token",
      "*.github_api_token",
      "headers.authorization",
      "*.headers.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

const usePretty =
  !isTest() && getBoolean("LOG_PRETTY", isLocal() && !isProduction());

const rootLogger: Logger = usePretty
  ? pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          messageKey: "message",
          ignore: "pid,hostname,service,stage",
        },
      },
    })
  : pino(baseOptions);

/**
 * Subset of the logger the report pipeline writes to; lets callers pass a stub.
 */
export type ReportLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Exits with `code` only after the logger has handed every pending line to
 * its destination.
 */
export function flushThenExit(
  logger: Pick<Logger, "flush">,
  code: number,
  exit: (code: number) => void = (c) => process.exit(c),
): void {
  process.exitCode = code;
  logger.flush(() => exit(code));
}
