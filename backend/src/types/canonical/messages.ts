/* SPDX-License-Identifier: MIT */
/**
 * Canonical message schemas
 *
 * The wire shape mirrors OpenAI Chat Completions. Content is a tagged union:
 * either plain text or an ordered list of text / image / tool_use blocks.
 */
import { z } from "zod";

export const RoleSchema = z.enum(["system", "user", "assistant", "tool"]);

export const TextBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

export const ImageBlockSchema = z.object({
  type: z.literal("image_url"),
  image_url: z.object({
    /** http(s) URL or `data:<media type>;base64,<data>` */
    url: z.string(),
    detail: z.enum(["auto", "low", "high"]).optional(),
  }),
});

export const ToolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string(),
  name: z.string(),
  input: z.record(z.string(), z.unknown()),
});

export const ContentBlockSchema = z.discriminatedUnion("type", [
  TextBlockSchema,
  ImageBlockSchema,
  ToolUseBlockSchema,
]);

export const ContentSchema = z.union([z.string(), z.array(ContentBlockSchema)]);

export const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function"),
  function: z.object({
    name: z.string(),
    /** JSON-encoded arguments, exactly as the model produced them */
    arguments: z.string(),
  }),
});

export const MessageParamSchema = z
  .object({
    role: RoleSchema,
    content: ContentSchema.nullable().optional(),
    name: z.string().optional(),
    tool_call_id: z.string().optional(),
    tool_calls: z.array(ToolCallSchema).optional(),
  })
  .superRefine((message, ctx) => {
    const hasContent =
      message.content !== undefined && message.content !== null;
    const hasToolCalls = (message.tool_calls?.length ?? 0) > 0;
    if (message.role !== "tool" && !hasContent && !hasToolCalls) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `A ${message.role} message must have content or tool_calls`,
        path: ["content"],
      });
    }
  });

/** Assistant message as returned inside a response choice */
export const ResponseMessageSchema = z.object({
  role: z.literal("assistant"),
  content: z.string().nullable(),
  tool_calls: z.array(ToolCallSchema).optional(),
});

export const ToolCallDeltaSchema = z.object({
  index: z.number().int().nonnegative(),
  id: z.string().optional(),
  type: z.literal("function").optional(),
  function: z
    .object({
      name: z.string().optional(),
      arguments: z.string().optional(),
    })
    .optional(),
});

/** Partial message fields carried by a stream chunk */
export const ChunkDeltaSchema = z.object({
  role: RoleSchema.optional(),
  content: z.string().nullable().optional(),
  tool_calls: z.array(ToolCallDeltaSchema).optional(),
});
