import { getLogger } from "../../util/logger";
import { describeError, TransportError } from "../domain/errors";
import type { IdentityProviderClient } from "./contracts";

export const GITHUB_GRAPHQL_URL = "https://api.github.com/graphql";
export const DEFAULT_TIMEOUT_MS = 30_000;
/** GitHub caps a connection page at 100 nodes; later pages are not requested. */
export const PAGE_SIZE = 100;

export const SAML_IDENTITIES_QUERY = `
query($org: String!) {
  organization(login: $org) {
    samlIdentityProvider {
      ssoUrl
      externalIdentities(first: ${PAGE_SIZE}) {
        edges {
          node {
            guid
            samlIdentity {
              nameId
            }
            user {
              login
            }
          }
        }
      }
    }
  }
}
`;

export interface GitHubIdentityClientOptions {
  token: string;
  endpoint?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function createGitHubIdentityClient(
  options: GitHubIdentityClientOptions,
): IdentityProviderClient {
  const {
    token,
    endpoint = GITHUB_GRAPHQL_URL,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetchImpl = fetch,
  } = options;
  const logger = getLogger("identity/github_client");

  return {
    async fetchExternalIdentities(organization: string): Promise<unknown> {
      logger.debug({ organization, endpoint }, "POST GraphQL query");

      let response: Response;
      try {
        response = await fetchImpl(endpoint, {
          method: "POST",
          headers: {
            Authorization: `bearer ${token}`,
            "Content-Type": "application/json",
            "User-Agent": "saml-identity-report",
          },
          body: JSON.stringify({
            query: SAML_IDENTITIES_QUERY,
            variables: { org: organization },
          }),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        const reason =
          err instanceof Error && err.name === "TimeoutError"
            ? `timed out after ${timeoutMs}ms`
            : describeError(err);
        throw new TransportError(
          organization,
          `Request for ${organization} failed: ${reason}`,
          { cause: err },
        );
      }

      if (!response.ok) {
        throw new TransportError(
          organization,
          `Request for ${organization} failed: HTTP ${response.status} ${response.statusText}`.trim(),
          { status: response.status },
        );
      }

      try {
        return await response.json();
      } catch (err) {
        throw new TransportError(
          organization,
          `Response for ${organization} is not valid JSON: ${describeError(err)}`,
          { status: response.status, cause: err },
        );
      }
    },
  };
}
