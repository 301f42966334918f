import {
  getBoolean,
  getEnvVar,
  getNumber,
  getStage,
  getString,
  isLocal,
  isProduction,
  isTest,
} from "../../util/env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with STAGE", () => {
    process.env.STAGE = "prod";
    expect(getStage()).toBe("prod");
    expect(isProduction()).toBe(true);
  });

  test("stage fallback to NODE_ENV", () => {
    delete process.env.STAGE;
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
  });

  test("jest runs count as test", () => {
    expect(isTest()).toBe(true);
  });

  test("isLocal is false on CI", () => {
    process.env.CI = "true";
    expect(isLocal()).toBe(false);
  });

  test("getEnvVar returns default when missing", () => {
    delete process.env.UNKNOWN_VAR;
    const value = getEnvVar("UNKNOWN_VAR", {
      defaultValue: "abc",
      parse: (raw) => raw,
    });
    expect(value).toBe("abc");
  });

  test("getEnvVar treats blank as missing and throws when required", () => {
    process.env.BLANK_VAR = "   ";
    expect(() =>
      getEnvVar("BLANK_VAR", { required: true, parse: (raw) => raw }),
    ).toThrow("Missing required env var: BLANK_VAR");
  });

  test("parsers: number and boolean", () => {
    process.env.NUMBER_KEY = "42";
    process.env.BOOL_KEY = "yes";
    expect(getNumber("NUMBER_KEY", 1)).toBe(42);
    expect(getBoolean("BOOL_KEY", false)).toBe(true);
  });

  test("getNumber rejects non-numeric values", () => {
    process.env.NUMBER_KEY = "soon";
    expect(() => getNumber("NUMBER_KEY", 1)).toThrow(
      "Env var NUMBER_KEY is not a number: soon",
    );
  });

  test("getString trims and falls back to default", () => {
    process.env.PADDED = "  value ";
    expect(getString("PADDED", "x")).toBe("value");
    expect(getString("NOPE", "x")).toBe("x");
  });
});
