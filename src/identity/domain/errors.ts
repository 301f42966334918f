/**
 * Error taxonomy of a report run.
 * ConfigError and EmptyResultError end the run; TransportError and
 * ExtractionError only skip the organization they belong to.
 */
export class ReportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends ReportError {}

export class TransportError extends ReportError {
  readonly organization: string;
  readonly status?: number;

  constructor(
    organization: string,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.organization = organization;
    this.status = options.status;
  }
}

export class ExtractionError extends ReportError {
  readonly organization: string;
  /** Dotted path of the first value that did not match the expected shape */
  readonly path: string;

  constructor(organization: string, path: string, message: string) {
    super(message);
    this.organization = organization;
    this.path = path;
  }
}

export class EmptyResultError extends ReportError {
  readonly organizations: string[];

  constructor(organizations: string[]) {
    super(
      `No users found across ${organizations.length} organization(s): ${organizations.join(", ")}`,
    );
    this.organizations = organizations;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
