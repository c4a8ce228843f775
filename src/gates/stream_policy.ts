import { readFileSync } from "node:fs";

import { z } from "zod";

export type ThinkingOutput = "reasoning_step" | "content";

export type StreamPolicy = {
  suppressedReasoningSteps: ReadonlySet<string>;
  sentinels: { open: string; close: string };
  thinkingOutput: ThinkingOutput;
  thinkingStepDescription: string;
  // content carrying both sentinels and at least this long is an echoed full answer
  duplicateDumpMinLength: number;
  fallbackMessage: string;
  errorMessage: string;
  exposeErrorDetails: boolean;
};

// Intent-classification bookkeeping steps.
export const DEFAULT_SUPPRESSED_STEPS = [
  "Intent classification and entity extraction prompt prepared",
  "LLM raw response for intent/entity",
  "LLM response parsed successfully",
  "LLM response JSON parsing error",
  "LLM call error",
  "Keyword-based intent classification",
] as const;

export const DEFAULT_STREAM_POLICY: StreamPolicy = {
  suppressedReasoningSteps: new Set(DEFAULT_SUPPRESSED_STEPS),
  sentinels: { open: "<think>", close: "</think>" },
  thinkingOutput: "reasoning_step",
  thinkingStepDescription: "Model's thinking process",
  duplicateDumpMinLength: 500,
  fallbackMessage: "No response could be generated. Please try again.",
  errorMessage: "An error occurred while generating the response.",
  exposeErrorDetails: false,
};

export const StreamPolicyFile = z
  .object({
    suppressedReasoningSteps: z.array(z.string().min(1)),
    sentinels: z.object({ open: z.string().min(1), close: z.string().min(1) }),
    thinkingOutput: z.enum(["reasoning_step", "content"]),
    thinkingStepDescription: z.string().min(1),
    duplicateDumpMinLength: z.number().int().positive(),
    fallbackMessage: z.string().trim().min(1),
    errorMessage: z.string().trim().min(1),
  })
  .partial()
  .strict();

export type StreamPolicyFile = z.infer<typeof StreamPolicyFile>;

export class StreamPolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StreamPolicyError";
  }
}

export function resolveStreamPolicy(
  overrides: StreamPolicyFile = {},
  args: { exposeErrorDetails?: boolean } = {}
): StreamPolicy {
  const base = DEFAULT_STREAM_POLICY;
  return {
    suppressedReasoningSteps: overrides.suppressedReasoningSteps
      ? new Set(overrides.suppressedReasoningSteps)
      : base.suppressedReasoningSteps,
    sentinels: overrides.sentinels ?? base.sentinels,
    thinkingOutput: overrides.thinkingOutput ?? base.thinkingOutput,
    thinkingStepDescription: overrides.thinkingStepDescription ?? base.thinkingStepDescription,
    duplicateDumpMinLength: overrides.duplicateDumpMinLength ?? base.duplicateDumpMinLength,
    fallbackMessage: overrides.fallbackMessage ?? base.fallbackMessage,
    errorMessage: overrides.errorMessage ?? base.errorMessage,
    exposeErrorDetails: args.exposeErrorDetails ?? base.exposeErrorDetails,
  };
}

/**
 * Load the policy table. Without a path the built-in defaults apply; with one,
 * the file's keys replace the matching defaults.
 */
export function loadStreamPolicy(args: {
  path?: string;
  exposeErrorDetails?: boolean;
}): StreamPolicy {
  if (!args.path) {
    return resolveStreamPolicy({}, { exposeErrorDetails: args.exposeErrorDetails });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(args.path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StreamPolicyError(`Cannot read stream policy ${args.path}: ${reason}`);
  }

  const parsed = StreamPolicyFile.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StreamPolicyError(`Invalid stream policy ${args.path}: ${issues}`);
  }

  return resolveStreamPolicy(parsed.data, { exposeErrorDetails: args.exposeErrorDetails });
}
