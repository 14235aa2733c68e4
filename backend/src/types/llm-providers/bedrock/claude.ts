/* SPDX-License-Identifier: MIT */
/**
 * Anthropic Claude on Bedrock - InvokeModel "messages" wire shape
 *
 * @see https://docs.aws.amazon.com/bedrock/latest/userguide/model-parameters-anthropic-claude-messages.html
 */
import { z } from "zod";

export const ANTHROPIC_VERSION = "bedrock-2023-05-31";

export const ImageSourceSchema = z.object({
  type: z.literal("base64"),
  media_type: z.string(),
  data: z.string(),
});

export const TextBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const ImageBlockSchema = z.object({
  type: z.literal("image"),
  source: ImageSourceSchema,
});

export const ToolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string(),
  name: z.string(),
  input: z.record(z.string(), z.unknown()),
});

export const ToolResultBlockSchema = z.object({
  type: z.literal("tool_result"),
  tool_use_id: z.string(),
  content: z.union([z.string(), z.array(TextBlockSchema)]).optional(),
  is_error: z.boolean().optional(),
});

export const ContentBlockSchema = z.discriminatedUnion("type", [
  TextBlockSchema,
  ImageBlockSchema,
  ToolUseBlockSchema,
  ToolResultBlockSchema,
]);

export const MessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.union([z.string(), z.array(ContentBlockSchema)]),
});

export const ToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  input_schema: z.record(z.string(), z.unknown()),
});

export const ToolChoiceSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("auto") }),
  z.object({ type: z.literal("any") }),
  z.object({ type: z.literal("tool"), name: z.string() }),
]);

export const RequestSchema = z.object({
  anthropic_version: z.string().optional(),
  /** Routing only; not part of the Bedrock body */
  model: z.string().optional(),
  model_id: z.string().optional(),
  max_tokens: z.number().int().positive(),
  messages: z.array(MessageSchema).min(1),
  system: z.union([z.string(), z.array(TextBlockSchema)]).optional(),
  temperature: z.number().min(0).max(1).optional(),
  top_p: z.number().min(0).max(1).optional(),
  top_k: z.number().int().nonnegative().optional(),
  stop_sequences: z.array(z.string()).optional(),
  stream: z.boolean().optional(),
  tools: z.array(ToolSchema).optional(),
  tool_choice: ToolChoiceSchema.optional(),
});

export const StopReasonSchema = z.enum([
  "end_turn",
  "max_tokens",
  "stop_sequence",
  "tool_use",
]);

export const UsageSchema = z.object({
  input_tokens: z.number().int().nonnegative(),
  output_tokens: z.number().int().nonnegative(),
});

export const ResponseSchema = z.object({
  id: z.string(),
  type: z.literal("message"),
  role: z.literal("assistant"),
  model: z.string(),
  content: z.array(z.union([TextBlockSchema, ToolUseBlockSchema])),
  stop_reason: StopReasonSchema.nullable(),
  stop_sequence: z.string().nullable().optional(),
  usage: UsageSchema,
});

export const MessageStartEventSchema = z.object({
  type: z.literal("message_start"),
  message: z.object({
    id: z.string(),
    type: z.literal("message"),
    role: z.literal("assistant"),
    model: z.string(),
    content: z.array(z.never()),
    stop_reason: z.null(),
    usage: UsageSchema,
  }),
});

export const ContentBlockStartEventSchema = z.object({
  type: z.literal("content_block_start"),
  index: z.number().int().nonnegative(),
  content_block: z.union([TextBlockSchema, ToolUseBlockSchema]),
});

export const ContentBlockDeltaEventSchema = z.object({
  type: z.literal("content_block_delta"),
  index: z.number().int().nonnegative(),
  delta: z.discriminatedUnion("type", [
    z.object({ type: z.literal("text_delta"), text: z.string() }),
    z.object({ type: z.literal("input_json_delta"), partial_json: z.string() }),
  ]),
});

export const MessageDeltaEventSchema = z.object({
  type: z.literal("message_delta"),
  delta: z.object({
    stop_reason: StopReasonSchema.nullable(),
  }),
  usage: z.object({ output_tokens: z.number().int().nonnegative() }).optional(),
});

export const ContentBlockStopEventSchema = z.object({
  type: z.literal("content_block_stop"),
  index: z.number().int().nonnegative(),
});

export const MessageStopEventSchema = z.object({
  type: z.literal("message_stop"),
});

/** Events the gateway emits when re-shaping a canonical stream for Claude callers */
export const StreamEventSchema = z.discriminatedUnion("type", [
  MessageStartEventSchema,
  ContentBlockStartEventSchema,
  ContentBlockDeltaEventSchema,
  ContentBlockStopEventSchema,
  MessageDeltaEventSchema,
  MessageStopEventSchema,
]);

/** canonical finish_reason -> Claude stop_reason */
export const STOP_REASON_BY_FINISH_REASON: Readonly<
  Record<string, z.infer<typeof StopReasonSchema>>
> = {
  stop: "end_turn",
  length: "max_tokens",
  tool_calls: "tool_use",
  content_filter: "stop_sequence",
  end_turn: "end_turn",
  max_tokens: "max_tokens",
  stop_sequence: "stop_sequence",
};
