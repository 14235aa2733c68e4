/**
 * Reverse adapter: lets a caller speak Bedrock Claude or Titan wire shapes
 * to any backend. Requests are converted into the canonical model on the way
 * in, and results converted back on the way out.
 */
import type { RequestFormat } from "@shared";
import { LLMIntegrationError, RequestValidationError } from "@/errors";
import logger from "@/logging";
import { Bedrock, Canonical } from "@/types";
import { parseToolArguments, toDataUrl } from "../utils/content";

// =============================================================================
// TYPE ALIASES
// =============================================================================

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type ChatCompletionResponse = Canonical.Types.ChatCompletionResponse;
type ChatCompletionChunk = Canonical.Types.ChatCompletionChunk;
type Message = Canonical.Types.Message;
type ContentBlock = Canonical.Types.ContentBlock;
type ToolCall = Canonical.Types.ToolCall;

type ClaudeRequest = Bedrock.Types.ClaudeRequest;
type ClaudeMessage = Bedrock.Types.ClaudeMessage;
type ClaudeResponse = Bedrock.Types.ClaudeResponse;
type ClaudeStopReason = Bedrock.Types.ClaudeStopReason;
type ClaudeStreamEvent = Bedrock.Types.ClaudeStreamEvent;
type TitanRequest = Bedrock.Types.TitanRequest;
type TitanResponse = Bedrock.Types.TitanResponse;
type TitanCompletionReason = Bedrock.Types.TitanCompletionReason;
type TitanStreamEvent = Bedrock.Types.TitanStreamEvent;

export type BedrockWireFormat = Exclude<RequestFormat, "openai">;

/**
 * Converts one canonical chunk into zero or more Bedrock-shaped stream
 * events. Holds per-stream state; create one per stream.
 */
export type BedrockStreamEncoder = (
  chunk: ChatCompletionChunk,
) => Bedrock.Types.StreamEvent[];

// =============================================================================
// BEDROCK REQUEST -> CANONICAL
// =============================================================================

/**
 * Validate a Bedrock-shaped body and convert it into a canonical request for
 * `model`. Validation failures surface as 422.
 */
export function toCanonicalRequest(
  raw: unknown,
  format: BedrockWireFormat,
  model: string,
): ChatCompletionRequest {
  const candidate =
    format === "bedrock_claude"
      ? claudeRequestToCanonical(parseClaudeRequest(raw), model)
      : titanRequestToCanonical(parseTitanRequest(raw), model);

  const parsed = Canonical.API.ChatCompletionRequestSchema.safeParse(candidate);
  if (!parsed.success) {
    throw RequestValidationError.fromZodError(
      "Converted request is not a valid chat completion",
      parsed.error,
    );
  }
  return parsed.data;
}

function parseClaudeRequest(raw: unknown): ClaudeRequest {
  const parsed = Bedrock.Claude.RequestSchema.safeParse(raw);
  if (!parsed.success) {
    throw RequestValidationError.fromZodError(
      "Invalid Bedrock Claude request",
      parsed.error,
    );
  }
  return parsed.data;
}

function parseTitanRequest(raw: unknown): TitanRequest {
  const parsed = Bedrock.Titan.RequestSchema.safeParse(raw);
  if (!parsed.success) {
    throw RequestValidationError.fromZodError(
      "Invalid Bedrock Titan request",
      parsed.error,
    );
  }
  return parsed.data;
}

export function claudeRequestToCanonical(
  request: ClaudeRequest,
  model: string,
): ChatCompletionRequest {
  const messages: Message[] = [];

  const system =
    typeof request.system === "string"
      ? request.system
      : request.system?.map((block) => block.text).join("\n");
  if (system !== undefined && system.length > 0) {
    messages.push({ role: "system", content: system });
  }
  for (const message of request.messages) {
    messages.push(...claudeMessageToCanonical(message));
  }

  const toolChoice = request.tool_choice;
  return {
    model,
    messages,
    max_tokens: request.max_tokens,
    ...(request.temperature !== undefined
      ? { temperature: request.temperature }
      : {}),
    ...(request.top_p !== undefined ? { top_p: request.top_p } : {}),
    ...(request.top_k !== undefined ? { top_k: request.top_k } : {}),
    ...(request.stop_sequences !== undefined
      ? { stop: request.stop_sequences }
      : {}),
    ...(request.stream !== undefined ? { stream: request.stream } : {}),
    ...(request.tools !== undefined
      ? {
          tools: request.tools.map((tool) => ({
            type: "function" as const,
            function: {
              name: tool.name,
              description: tool.description ?? "",
              parameters: tool.input_schema,
            },
          })),
        }
      : {}),
    ...(toolChoice !== undefined
      ? {
          tool_choice:
            toolChoice.type === "tool"
              ? { type: "function" as const, function: { name: toolChoice.name } }
              : toolChoice.type === "any"
                ? ("required" as const)
                : ("auto" as const),
        }
      : {}),
  };
}

/**
 * One Claude turn can expand into several canonical messages: tool_result
 * blocks become `tool` messages, placed ahead of the user's remaining content.
 */
function claudeMessageToCanonical(message: ClaudeMessage): Message[] {
  if (typeof message.content === "string") {
    return [{ role: message.role, content: message.content }];
  }

  if (message.role === "assistant") {
    const text = message.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("");
    const toolCalls = message.content.flatMap((block): ToolCall[] =>
      block.type === "tool_use"
        ? [
            {
              id: block.id,
              type: "function",
              function: { name: block.name, arguments: JSON.stringify(block.input) },
            },
          ]
        : [],
    );
    if (toolCalls.length === 0) {
      return [{ role: "assistant", content: text }];
    }
    return [
      {
        role: "assistant",
        content: text.length > 0 ? text : null,
        tool_calls: toolCalls,
      },
    ];
  }

  const toolMessages: Message[] = [];
  const blocks: ContentBlock[] = [];
  for (const block of message.content) {
    switch (block.type) {
      case "text":
        blocks.push({ type: "text", text: block.text });
        break;
      case "image":
        blocks.push({
          type: "image_url",
          image_url: { url: toDataUrl(block.source.media_type, block.source.data) },
        });
        break;
      case "tool_result":
        toolMessages.push({
          role: "tool",
          tool_call_id: block.tool_use_id,
          content:
            typeof block.content === "string"
              ? block.content
              : (block.content ?? []).map((part) => part.text).join("\n"),
        });
        break;
      case "tool_use":
        logger.debug(
          { toolUseId: block.id },
          "[BedrockToOpenAIAdapter] dropping tool_use block from user turn",
        );
        break;
    }
  }

  return blocks.length > 0
    ? [...toolMessages, { role: "user", content: blocks }]
    : toolMessages;
}

export function titanRequestToCanonical(
  request: TitanRequest,
  model: string,
): ChatCompletionRequest {
  const config = request.textGenerationConfig;
  return {
    model,
    messages: [{ role: "user", content: request.inputText }],
    ...(config?.maxTokenCount !== undefined
      ? { max_tokens: config.maxTokenCount }
      : {}),
    ...(config?.temperature !== undefined
      ? { temperature: config.temperature }
      : {}),
    ...(config?.topP !== undefined ? { top_p: config.topP } : {}),
    ...(config?.stopSequences !== undefined
      ? { stop: config.stopSequences }
      : {}),
    ...(request.stream !== undefined ? { stream: request.stream } : {}),
  };
}

// =============================================================================
// CANONICAL RESPONSE -> BEDROCK
// =============================================================================

export function toClaudeStopReason(
  finishReason: string | null,
): ClaudeStopReason {
  if (finishReason === null) {
    return "end_turn";
  }
  return (
    Bedrock.Claude.STOP_REASON_BY_FINISH_REASON[finishReason] ?? "end_turn"
  );
}

export function toTitanCompletionReason(
  finishReason: string | null,
): TitanCompletionReason {
  if (finishReason === null) {
    return "FINISH";
  }
  return (
    Bedrock.Titan.COMPLETION_REASON_BY_FINISH_REASON[finishReason] ?? "FINISH"
  );
}

function firstChoice(response: ChatCompletionResponse) {
  const [choice] = response.choices;
  if (choice === undefined) {
    throw new LLMIntegrationError("Response has no choices to convert", {
      code: "empty_response",
    });
  }
  return choice;
}

export function toClaudeResponse(response: ChatCompletionResponse): ClaudeResponse {
  const choice = firstChoice(response);
  const content: ClaudeResponse["content"] = [];
  if (choice.message.content) {
    content.push({ type: "text", text: choice.message.content });
  }
  for (const toolCall of choice.message.tool_calls ?? []) {
    content.push({
      type: "tool_use",
      id: toolCall.id,
      name: toolCall.function.name,
      input: parseToolArguments(toolCall.function.arguments),
    });
  }

  return {
    id: response.id,
    type: "message",
    role: "assistant",
    model: response.model,
    content,
    stop_reason: toClaudeStopReason(choice.finish_reason),
    stop_sequence: null,
    usage: {
      input_tokens: response.usage?.prompt_tokens ?? 0,
      output_tokens: response.usage?.completion_tokens ?? 0,
    },
  };
}

export function toTitanResponse(response: ChatCompletionResponse): TitanResponse {
  const choice = firstChoice(response);
  return {
    inputTextTokenCount: response.usage?.prompt_tokens ?? 0,
    results: [
      {
        tokenCount: response.usage?.completion_tokens ?? 0,
        outputText: choice.message.content ?? "",
        completionReason: toTitanCompletionReason(choice.finish_reason),
      },
    ],
  };
}

// =============================================================================
// CANONICAL STREAM -> BEDROCK EVENTS
// =============================================================================

/**
 * Claude stream: message_start before the first event, text at block 0, tool
 * call `i` at block `i + 1`, and on finish every open block is stopped before
 * message_delta / message_stop.
 */
export function createClaudeStreamEncoder(
  modelId: string,
): (chunk: ChatCompletionChunk) => ClaudeStreamEvent[] {
  let started = false;
  const openBlocks: number[] = [];

  return (chunk) => {
    const events: ClaudeStreamEvent[] = [];
    if (!started) {
      started = true;
      events.push({
        type: "message_start",
        message: {
          id: chunk.id,
          type: "message",
          role: "assistant",
          model: modelId,
          content: [],
          stop_reason: null,
          usage: { input_tokens: chunk.usage?.prompt_tokens ?? 0, output_tokens: 0 },
        },
      });
    }

    const [choice] = chunk.choices;
    if (choice === undefined) {
      return events;
    }

    const text = choice.delta.content;
    if (typeof text === "string" && text.length > 0) {
      if (!openBlocks.includes(0)) {
        openBlocks.push(0);
        events.push({
          type: "content_block_start",
          index: 0,
          content_block: { type: "text", text: "" },
        });
      }
      events.push({
        type: "content_block_delta",
        index: 0,
        delta: { type: "text_delta", text },
      });
    }

    for (const toolCall of choice.delta.tool_calls ?? []) {
      const index = toolCall.index + 1;
      if (toolCall.id !== undefined && !openBlocks.includes(index)) {
        openBlocks.push(index);
        events.push({
          type: "content_block_start",
          index,
          content_block: {
            type: "tool_use",
            id: toolCall.id,
            name: toolCall.function?.name ?? "",
            input: {},
          },
        });
      }
      const partialJson = toolCall.function?.arguments;
      if (partialJson !== undefined && partialJson.length > 0) {
        events.push({
          type: "content_block_delta",
          index,
          delta: { type: "input_json_delta", partial_json: partialJson },
        });
      }
    }

    if (choice.finish_reason !== null) {
      for (const index of openBlocks.splice(0)) {
        events.push({ type: "content_block_stop", index });
      }
      events.push({
        type: "message_delta",
        delta: { stop_reason: toClaudeStopReason(choice.finish_reason) },
        ...(chunk.usage
          ? { usage: { output_tokens: chunk.usage.completion_tokens } }
          : {}),
      });
      events.push({ type: "message_stop" });
    }

    return events;
  };
}

/**
 * Titan stream: one flat record per content-bearing chunk; the finish chunk
 * carries completionReason and, when known, the token counts.
 */
export function createTitanStreamEncoder(): (
  chunk: ChatCompletionChunk,
) => TitanStreamEvent[] {
  return (chunk) => {
    const [choice] = chunk.choices;
    if (choice === undefined) {
      return [];
    }
    const outputText = choice.delta.content ?? "";
    if (outputText.length === 0 && choice.finish_reason === null) {
      return [];
    }
    return [
      {
        outputText,
        index: choice.index,
        ...(choice.finish_reason !== null
          ? {
              completionReason: toTitanCompletionReason(choice.finish_reason),
              ...(chunk.usage
                ? {
                    inputTextTokenCount: chunk.usage.prompt_tokens,
                    totalOutputTextTokenCount: chunk.usage.completion_tokens,
                  }
                : {}),
            }
          : {}),
      },
    ];
  };
}

// =============================================================================
// ADAPTER
// =============================================================================

/**
 * Reshapes canonical results for Bedrock-shaped callers of `modelId`
 */
export class BedrockToOpenAIAdapter {
  readonly modelId: string;

  constructor(modelId: string) {
    this.modelId = modelId;
  }

  fromCanonicalResponse(
    response: ChatCompletionResponse,
    format: BedrockWireFormat,
  ): Bedrock.Types.Response {
    return format === "bedrock_claude"
      ? toClaudeResponse(response)
      : toTitanResponse(response);
  }

  createStreamEncoder(format: BedrockWireFormat): BedrockStreamEncoder {
    return format === "bedrock_claude"
      ? createClaudeStreamEncoder(this.modelId)
      : createTitanStreamEncoder();
  }
}
