import { describe, expect, it } from "vitest";
import { ConfigError, loadAssessorConfig, parseAssessorEnv } from "./env";
import { CLARK_ASSESSOR_CONFIG } from "../sources/clark-assessor/constants";

describe("loadAssessorConfig", () => {
  it("keeps the source defaults when nothing is set", () => {
    expect(loadAssessorConfig({})).toEqual({
      source: CLARK_ASSESSOR_CONFIG,
      requestDelayMs: 0,
    });
  });

  it("applies overrides from the environment", () => {
    const { source, requestDelayMs } = loadAssessorConfig({
      ASSESSOR_TIMEOUT_MS: "2500",
      ASSESSOR_MAX_RETRIES: "0",
      ASSESSOR_BACKOFF_FACTOR_MS: "50",
      ASSESSOR_VERIFY_SSL: "true",
      ASSESSOR_REQUEST_DELAY_MS: "1000",
      ASSESSOR_BASE_URL: "http://localhost:8080/assessor",
    });

    expect(source.timeoutMs).toBe(2500);
    expect(source.verifySsl).toBe(true);
    expect(source.retry).toEqual({
      ...CLARK_ASSESSOR_CONFIG.retry,
      maxRetries: 0,
      backoffFactorMs: 50,
    });
    expect(source.baseUrl).toBe("http://localhost:8080/assessor/");
    expect(requestDelayMs).toBe(1000);
  });

  it("treats blank values as unset", () => {
    expect(loadAssessorConfig({ ASSESSOR_TIMEOUT_MS: "  " }).source.timeoutMs).toBe(
      CLARK_ASSESSOR_CONFIG.timeoutMs
    );
  });

  it("does not modify the defaults", () => {
    loadAssessorConfig({ ASSESSOR_MAX_RETRIES: "7" });
    expect(CLARK_ASSESSOR_CONFIG.retry.maxRetries).toBe(3);
  });
});

describe("parseAssessorEnv", () => {
  it("understands boolean spellings", () => {
    expect(parseAssessorEnv({ ASSESSOR_VERIFY_SSL: "0" }).ASSESSOR_VERIFY_SSL).toBe(false);
    expect(parseAssessorEnv({ ASSESSOR_VERIFY_SSL: "yes" }).ASSESSOR_VERIFY_SSL).toBe(true);
  });

  it("rejects invalid values with every offending variable", () => {
    let error: unknown;
    try {
      parseAssessorEnv({ ASSESSOR_TIMEOUT_MS: "soon", ASSESSOR_VERIFY_SSL: "maybe" });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues.map((issue) => issue.split(":")[0]).sort()).toEqual([
      "ASSESSOR_TIMEOUT_MS",
      "ASSESSOR_VERIFY_SSL",
    ]);
  });
});
