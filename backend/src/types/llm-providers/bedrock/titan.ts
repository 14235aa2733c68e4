/* SPDX-License-Identifier: MIT */
/**
 * Amazon Titan Text on Bedrock - InvokeModel wire shape
 *
 * @see https://docs.aws.amazon.com/bedrock/latest/userguide/model-parameters-titan-text.html
 */
import { z } from "zod";

export const TextGenerationConfigSchema = z.object({
  maxTokenCount: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(1).optional(),
  topP: z.number().min(0).max(1).optional(),
  stopSequences: z.array(z.string()).optional(),
});

export const RequestSchema = z.object({
  /** Routing only; not part of the Bedrock body */
  model: z.string().optional(),
  inputText: z.string(),
  textGenerationConfig: TextGenerationConfigSchema.optional(),
  stream: z.boolean().optional(),
});

export const CompletionReasonSchema = z.enum([
  "FINISH",
  "LENGTH",
  "CONTENT_FILTERED",
]);

export const ResultSchema = z.object({
  tokenCount: z.number().int().nonnegative(),
  outputText: z.string(),
  completionReason: CompletionReasonSchema,
});

export const ResponseSchema = z.object({
  inputTextTokenCount: z.number().int().nonnegative(),
  results: z.array(ResultSchema),
});

export const StreamEventSchema = z.object({
  outputText: z.string(),
  index: z.number().int().nonnegative(),
  totalOutputTextTokenCount: z.number().int().nonnegative().optional(),
  inputTextTokenCount: z.number().int().nonnegative().optional(),
  completionReason: CompletionReasonSchema.optional(),
});

/** canonical finish_reason -> Titan completionReason */
export const COMPLETION_REASON_BY_FINISH_REASON: Readonly<
  Record<string, z.infer<typeof CompletionReasonSchema>>
> = {
  stop: "FINISH",
  length: "LENGTH",
  content_filter: "CONTENT_FILTERED",
  max_tokens: "LENGTH",
};
