/**
 * Environment utilities for runtime detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  return getStage() === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test" || Boolean(process.env.JEST_WORKER_ID);
}

export function isLocal(): boolean {
  // CI runners and scheduled jobs collect JSON logs; an interactive terminal does not
  const isCi = process.env.CI === "true" || process.env.CI === "1";
  return !isCi && Boolean(process.stdout.isTTY);
}

export interface GetEnvVarOptions<T> {
  defaultValue?: T;
  required?: boolean;
  parse: (raw: string) => T;
}

/**
 * Reads an environment variable and parses it.
 * - Blank values count as absent.
 * - If absent, returns `defaultValue` when provided; otherwise throws when `required` is true.
 */
export function getEnvVar<T>(
  name: string,
  options: GetEnvVarOptions<T>,
): T | undefined {
  const candidate = process.env[name];

  if (candidate != null && candidate.trim() !== "") {
    return options.parse(candidate.trim());
  }

  if (options.defaultValue !== undefined) {
    return options.defaultValue;
  }

  if (options.required) {
    throw new Error(`Missing required env var: ${name}`);
  }

  return undefined;
}

export function getString(name: string, defaultValue: string): string {
  return getEnvVar(name, { defaultValue, parse: (raw) => raw }) ?? defaultValue;
}

export function getNumber(name: string, defaultValue: number): number {
  const value = getEnvVar(name, {
    defaultValue,
    parse: (raw) => {
      const n = Number(raw);
      if (Number.isNaN(n))
        throw new Error(`Env var ${name} is not a number: ${raw}`);
      return n;
    },
  });
  return value ?? defaultValue;
}

export function getBoolean(name: string, defaultValue: boolean): boolean {
  const value = getEnvVar(name, {
    defaultValue,
    parse: (raw) => {
      const lowered = raw.toLowerCase();
      if (["1", "true", "yes", "y"].includes(lowered)) return true;
      if (["0", "false", "no", "n"].includes(lowered)) return false;
      throw new Error(`Env var ${name} is not a boolean: ${raw}`);
    },
  });
  return value ?? defaultValue;
}
