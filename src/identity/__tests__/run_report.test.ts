import { mkdtemp, readdir, readFile, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { runReport } from "@src/identity/application/run_report";
import { TransportError } from "@src/identity/domain/errors";
import type { IdentityProviderClient } from "@src/identity/infrastructure/contracts";
import { createLoggerStub, identitiesResponse, identityEdge } from "./fixtures";

const clock = () => new Date(Date.UTC(2026, 0, 15, 17, 5, 9));

function stubClient(
  responses: Record<string, () => Promise<unknown>>,
): IdentityProviderClient & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async fetchExternalIdentities(organization: string) {
      calls.push(organization);
      const respond = responses[organization];
      if (!respond) throw new Error(`no stub for ${organization}`);
      return respond();
    },
  };
}

describe("runReport", () => {
  let tmp: string;
  let outputDir: string;

  beforeEach(async () => {
    tmp = await mkdtemp(path.join(os.tmpdir(), "saml-run-"));
    outputDir = path.join(tmp, "Reports");
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it("keeps going past a malformed organization", async () => {
    const logger = createLoggerStub();
    const client = stubClient({
      acme: async () =>
        identitiesResponse([
          identityEdge("octo", "octo@example.test"),
          identityEdge("cat", "cat@example.test"),
        ]),
      beta: async () => ({ data: { organization: null } }),
    });

    const outcome = await runReport({
      organizations: ["acme", "beta"],
      htmlHeader: "Example Corp",
      client,
      outputDir,
      clock,
      logger,
    });

    expect(client.calls).toEqual(["acme", "beta"]);
    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.total).toBe(2);
    expect(outcome.perOrganization).toEqual([
      { organization: "acme", ok: true, count: 2 },
      { organization: "beta", ok: true, count: 0 },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toMatchObject({ organization: "beta" });

    expect(outcome.csvPath).toBe(
      path.join(outputDir, "saml_users_2026-01-15_120509.csv"),
    );
    expect(outcome.htmlPath).toBe(
      path.join(outputDir, "saml_users_2026-01-15_120509.html"),
    );

    const csv = await readFile(outcome.csvPath, "utf-8");
    expect(csv).toBe(
      "Organization,Username,Email Address\r\n" +
        "acme,octo,octo@example.test\r\n" +
        "acme,cat,cat@example.test\r\n",
    );

    const html = await readFile(outcome.htmlPath, "utf-8");
    expect(html.match(/<tr>/g)).toHaveLength(3);
    expect(html).toContain(
      "<h2>Example Corp acme, beta with SSO account information</h2>",
    );
    expect(html).toContain("01-15-2026 12:05:09");
  });

  it("skips an organization whose request fails", async () => {
    const logger = createLoggerStub();
    const client = stubClient({
      acme: async () => {
        throw new TransportError("acme", "Request for acme failed: HTTP 502 Bad Gateway", {
          status: 502,
        });
      },
      beta: async () =>
        identitiesResponse([identityEdge("dog", "dog@example.test")]),
    });

    const outcome = await runReport({
      organizations: ["acme", "beta"],
      htmlHeader: "Example Corp",
      client,
      outputDir,
      clock,
      logger,
    });

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.total).toBe(1);
    expect(outcome.perOrganization[0]).toEqual({
      organization: "acme",
      ok: false,
      error: "Request for acme failed: HTTP 502 Bad Gateway",
    });
    expect(logger.error).toHaveBeenCalledWith(
      { organization: "acme", status: 502 },
      "Error fetching data: Request for acme failed: HTTP 502 Bad Gateway",
    );
  });

  it("logs unexpected per-organization errors and continues", async () => {
    const logger = createLoggerStub();
    const client = stubClient({
      beta: async () =>
        identitiesResponse([identityEdge("dog", "dog@example.test")]),
    });

    const outcome = await runReport({
      organizations: ["ghost", "beta"],
      htmlHeader: "Example Corp",
      client,
      outputDir,
      clock,
      logger,
    });

    expect(outcome.status).toBe("ok");
    expect(logger.error.mock.calls[0][1]).toBe(
      "Unexpected error: no stub for ghost",
    );
  });

  it("writes nothing when no organization returns users", async () => {
    const logger = createLoggerStub();
    const client = stubClient({
      acme: async () => identitiesResponse([]),
      beta: async () => ({ errors: [{ message: "Resource not accessible" }] }),
    });

    const outcome = await runReport({
      organizations: ["acme", "beta"],
      htmlHeader: "Example Corp",
      client,
      outputDir,
      clock,
      logger,
    });

    expect(outcome).toEqual({
      status: "empty",
      perOrganization: [
        { organization: "acme", ok: true, count: 0 },
        { organization: "beta", ok: true, count: 0 },
      ],
    });
    await expect(stat(outputDir)).rejects.toThrow();
    expect(await readdir(tmp)).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      {
        hints: [
          "API token has correct permissions",
          "Organizations have SAML enabled",
          "Organization names are correct",
        ],
      },
      "No users found. Please check: API token has correct permissions; Organizations have SAML enabled; Organization names are correct",
    );
  });
});
