/* SPDX-License-Identifier: MIT */
/**
 * Canonical request / response / chunk schemas
 */
import { z } from "zod";
import {
  ChunkDeltaSchema,
  MessageParamSchema,
  ResponseMessageSchema,
} from "./messages";
import { ToolChoiceOptionSchema, ToolSchema } from "./tools";

/**
 * Closed set of canonical finish reasons. Provider values a Strategy has no
 * mapping for pass through unchanged, hence `FinishReasonValueSchema`.
 */
export const FinishReasonSchema = z.enum([
  "stop",
  "length",
  "tool_calls",
  "content_filter",
  "end_turn",
  "max_tokens",
  "stop_sequence",
]);

export const FinishReasonValueSchema = z.union([
  FinishReasonSchema,
  z.string(),
]);

export const CitationFormatSchema = z.enum(["openai", "bedrock"]);

export const ChatCompletionRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(MessageParamSchema).min(1),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  top_p: z.number().min(0).max(1).optional(),
  /** Not part of OpenAI; honoured by Bedrock families that sample top-k */
  top_k: z.number().int().nonnegative().optional(),
  stop: z.union([z.string(), z.array(z.string())]).optional(),
  presence_penalty: z.number().min(-2).max(2).optional(),
  frequency_penalty: z.number().min(-2).max(2).optional(),
  logit_bias: z.record(z.string(), z.number()).optional(),
  user: z.string().optional(),
  stream: z.boolean().optional(),
  tools: z.array(ToolSchema).optional(),
  tool_choice: ToolChoiceOptionSchema.optional(),

  // Extension fields, consumed only by the enhancement step
  file_ids: z.array(z.string()).optional(),
  knowledge_base_id: z.string().optional(),
  auto_kb: z.boolean().optional(),
  retrieval_config: z.record(z.string(), z.unknown()).optional(),
  citation_format: CitationFormatSchema.optional(),
});

export const ChatCompletionUsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative(),
});

export const ChoiceSchema = z.object({
  index: z.number().int().nonnegative(),
  message: ResponseMessageSchema,
  finish_reason: FinishReasonValueSchema.nullable(),
});

export const KnowledgeBaseMetadataSchema = z.object({
  knowledge_base_used: z.boolean(),
  citations_count: z.number().int().nonnegative(),
  session_id: z.string().nullable(),
});

export const ChatCompletionResponseSchema = z.object({
  id: z.string(),
  object: z.literal("chat.completion"),
  created: z.number().int(),
  model: z.string(),
  choices: z.array(ChoiceSchema),
  usage: ChatCompletionUsageSchema.optional(),
  kb_metadata: KnowledgeBaseMetadataSchema.optional(),
});

export const ChunkChoiceSchema = z.object({
  index: z.number().int().nonnegative(),
  delta: ChunkDeltaSchema,
  finish_reason: FinishReasonValueSchema.nullable(),
});

export const ChatCompletionChunkSchema = z.object({
  id: z.string(),
  object: z.literal("chat.completion.chunk"),
  created: z.number().int(),
  model: z.string(),
  choices: z.array(ChunkChoiceSchema),
  usage: ChatCompletionUsageSchema.nullable().optional(),
});
