/**
 * Domain types for the SAML identity report.
 */

/** One GitHub account linked to an external SAML identity. */
export interface UserRecord {
  readonly organization: string;
  readonly username: string;
  /** SAML `nameId` of the linked identity; usually an email address */
  readonly email: string;
}

export interface AppConfig {
  token: string;
  organizations: string[];
  htmlHeader: string;
}

/** The single run instant, rendered for display and for file names. */
export interface ReportTimestamp {
  /** MM-DD-YYYY HH:mm:ss */
  display: string;
  /** YYYY-MM-DD_HHmmss */
  file: string;
}

export type OrganizationResult =
  | { organization: string; ok: true; count: number }
  | { organization: string; ok: false; error: string };

export type RunOutcome =
  | {
      status: "ok";
      total: number;
      csvPath: string;
      htmlPath: string;
      perOrganization: OrganizationResult[];
    }
  | { status: "empty"; perOrganization: OrganizationResult[] };
