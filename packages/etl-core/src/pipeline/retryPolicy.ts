import { z } from "zod";

import { ConfigurationError } from "../errors";
import type { PipelineStage, RetryPolicy } from "../types";

const retryCount = z.number().int().nonnegative();

export const RetrySettingsSchema = z
  .object({
    extract_retries: retryCount,
    copy_data_retries: retryCount,
    insert_data_retries: retryCount
  })
  .strict();

export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "retry"}: ${issue.message}`)
    .join("; ");
}

/**
 * Retry budgets are required. A zero budget fails a stage on its first
 * error; a missing section is a configuration error, never a default.
 */
export function parseRetryPolicy(raw: unknown): RetryPolicy {
  if (raw === undefined || raw === null) {
    throw new ConfigurationError("Retry settings are missing");
  }

  const parsed = RetrySettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid retry settings: ${describeIssues(parsed.error)}`
    );
  }

  return Object.freeze({
    extractRetries: parsed.data.extract_retries,
    copyDataRetries: parsed.data.copy_data_retries,
    insertDataRetries: parsed.data.insert_data_retries
  });
}

export function retriesFor(policy: RetryPolicy, stage: PipelineStage): number {
  switch (stage) {
    case "extract":
      return policy.extractRetries;
    case "copy":
      return policy.copyDataRetries;
    case "insert":
      return policy.insertDataRetries;
  }
}

export function maxAttempts(policy: RetryPolicy, stage: PipelineStage): number {
  return retriesFor(policy, stage) + 1;
}
