/**
 * Environment Configuration
 *
 * Optional overrides for the assessor source config. Defaults stay in
 * CLARK_ASSESSOR_CONFIG; only variables that are set take effect.
 */

import { z } from "zod";
import type { SourceConfig } from "../types";
import { CLARK_ASSESSOR_CONFIG } from "../sources/clark-assessor/constants";

// ============================================================================
// Schema
// ============================================================================

const nonNegativeInt = z.coerce.number().int().min(0);

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

export const assessorEnvSchema = z.object({
  ASSESSOR_BASE_URL: z.url().optional(),
  ASSESSOR_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  ASSESSOR_MAX_RETRIES: nonNegativeInt.optional(),
  ASSESSOR_BACKOFF_FACTOR_MS: nonNegativeInt.optional(),
  ASSESSOR_VERIFY_SSL: booleanFlag.optional(),
  ASSESSOR_REQUEST_DELAY_MS: nonNegativeInt.optional(),
});

export type AssessorEnv = z.infer<typeof assessorEnvSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Loading
// ============================================================================

export interface AssessorRuntimeConfig {
  source: SourceConfig;
  requestDelayMs: number;
}

/** Blank values count as unset */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const key of Object.keys(assessorEnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) values[key] = value;
  }
  return values;
}

export function parseAssessorEnv(env: NodeJS.ProcessEnv = process.env): AssessorEnv {
  const result = assessorEnvSchema.safeParse(presentValues(env));
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigError(`Invalid assessor configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function loadAssessorConfig(
  env: NodeJS.ProcessEnv = process.env,
  base: SourceConfig = CLARK_ASSESSOR_CONFIG
): AssessorRuntimeConfig {
  const parsed = parseAssessorEnv(env);

  // new URL() resolves relative paths against the last segment, so keep the slash
  const baseUrl = parsed.ASSESSOR_BASE_URL
    ? parsed.ASSESSOR_BASE_URL.replace(/\/?$/, "/")
    : base.baseUrl;

  return {
    source: {
      ...base,
      baseUrl,
      timeoutMs: parsed.ASSESSOR_TIMEOUT_MS ?? base.timeoutMs,
      verifySsl: parsed.ASSESSOR_VERIFY_SSL ?? base.verifySsl,
      retry: {
        ...base.retry,
        maxRetries: parsed.ASSESSOR_MAX_RETRIES ?? base.retry.maxRetries,
        backoffFactorMs: parsed.ASSESSOR_BACKOFF_FACTOR_MS ?? base.retry.backoffFactorMs,
      },
    },
    requestDelayMs: parsed.ASSESSOR_REQUEST_DELAY_MS ?? 0,
  };
}
