import { z } from "zod";
import { getLogger, type ReportLogger } from "../../util/logger";
import { ExtractionError } from "../domain/errors";
import type { UserRecord } from "../domain/types";

/**
 * Shape of a successful externalIdentities query, down to the fields we read.
 * Anything else GitHub returns alongside is ignored.
 */
const edgeSchema = z.object({
  node: z.object({
    user: z.object({ login: z.string() }),
    samlIdentity: z.object({ nameId: z.string() }),
  }),
});

const responseSchema = z.object({
  data: z.object({
    organization: z.object({
      samlIdentityProvider: z.object({
        externalIdentities: z.object({
          edges: z.array(edgeSchema),
        }),
      }),
    }),
  }),
});

const graphQlErrorsSchema = z.object({
  errors: z.array(z.object({ message: z.string() })).min(1),
});

function formatPath(path: Array<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, "");
}

/**
 * Validates a raw response and returns the first mismatch as an ExtractionError,
 * or the typed edges when the response has the expected shape.
 */
export function checkResponse(
  response: unknown,
  organization: string,
): { ok: true; edges: z.infer<typeof edgeSchema>[] } | { ok: false; error: ExtractionError } {
  const parsed = responseSchema.safeParse(response);
  if (parsed.success) {
    return {
      ok: true,
      edges: parsed.data.data.organization.samlIdentityProvider.externalIdentities.edges,
    };
  }

  const issue = parsed.error.issues[0];
  const path = issue ? formatPath(issue.path) : "";
  const detail = issue ? issue.message : "unexpected response";
  const apiErrors = graphQlErrorsSchema.safeParse(response);
  const apiMessage = apiErrors.success
    ? ` (API errors: ${apiErrors.data.errors.map((e) => e.message).join("; ")})`
    : "";

  return {
    ok: false,
    error: new ExtractionError(
      organization,
      path,
      `Could not parse users for ${organization}: ${detail} at ${path || "<root>"}${apiMessage}`,
    ),
  };
}

/**
 * Flattens one organization's response into user records, one per edge.
 * Never throws: a malformed response is logged and yields no records.
 */
export function extractUsers(
  response: unknown,
  organization: string,
  logger: ReportLogger = getLogger("identity/extract_users"),
): UserRecord[] {
  const checked = checkResponse(response, organization);
  if (!checked.ok) {
    logger.warn(
      { organization, path: checked.error.path },
      checked.error.message,
    );
    return [];
  }

  return checked.edges.map(({ node }) => ({
    organization,
    username: node.user.login,
    email: node.samlIdentity.nameId,
  }));
}
