/**
 * OpenAI adapter: the canonical model already is the OpenAI wire shape, so
 * this is field mapping plus normalisation of what comes back.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */
import { randomUUID } from "node:crypto";
import type {
  ChatCompletion,
  ChatCompletionChunk as OpenAiChatCompletionChunk,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { OpenAiChatClient } from "@/clients/openai-client";
import type { ProviderDefaults } from "@/config";
import { RequestValidationError } from "@/errors";
import logger from "@/logging";
import type { Canonical, ChatAdapter } from "@/types";
import { contentToText } from "../utils/content";
import { finalizeChunkStream, makeFinishChunk } from "./chunk-stream";

// =============================================================================
// TYPE ALIASES
// =============================================================================

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type ChatCompletionResponse = Canonical.Types.ChatCompletionResponse;
type ChatCompletionChunk = Canonical.Types.ChatCompletionChunk;
type Content = Canonical.Types.Content;
type Message = Canonical.Types.Message;
type ToolCall = Canonical.Types.ToolCall;
type ToolCallDelta = Canonical.Types.ToolCallDelta;
type Usage = Canonical.Types.Usage;

export type OpenAiRequestParams = Omit<
  ChatCompletionCreateParamsNonStreaming,
  "stream"
>;

export interface OpenAIAdapterOptions {
  client: OpenAiChatClient;
  defaults: ProviderDefaults;
}

export class OpenAIAdapter implements ChatAdapter<OpenAiRequestParams> {
  readonly provider = "openai" as const;
  readonly modelId: string;
  private readonly client: OpenAiChatClient;
  private readonly defaults: ProviderDefaults;

  constructor(modelId: string, options: OpenAIAdapterOptions) {
    this.modelId = modelId;
    this.client = options.client;
    this.defaults = options.defaults;
  }

  // ===========================================================================
  // REQUEST
  // ===========================================================================

  toProviderPayload(request: ChatCompletionRequest): OpenAiRequestParams {
    const defaults = this.defaults.get("openai");
    return {
      model: this.modelId,
      messages: request.messages.map((message) => this.toOpenAiMessage(message)),
      max_tokens: request.max_tokens ?? defaults.maxTokens,
      temperature: request.temperature ?? defaults.temperature,
      ...(request.top_p !== undefined ? { top_p: request.top_p } : {}),
      ...(request.stop !== undefined ? { stop: request.stop } : {}),
      ...(request.presence_penalty !== undefined
        ? { presence_penalty: request.presence_penalty }
        : {}),
      ...(request.frequency_penalty !== undefined
        ? { frequency_penalty: request.frequency_penalty }
        : {}),
      ...(request.logit_bias !== undefined
        ? { logit_bias: request.logit_bias }
        : {}),
      ...(request.user !== undefined ? { user: request.user } : {}),
      ...(request.tools !== undefined
        ? { tools: request.tools.map((tool) => this.toOpenAiTool(tool)) }
        : {}),
      ...(request.tool_choice !== undefined
        ? { tool_choice: request.tool_choice }
        : {}),
    };
  }

  private toOpenAiMessage(message: Message): ChatCompletionMessageParam {
    const name = message.name !== undefined ? { name: message.name } : {};
    switch (message.role) {
      case "system":
        return { role: "system", content: contentToText(message.content), ...name };
      case "user":
        return {
          role: "user",
          content: this.toUserContent(message.content),
          ...name,
        };
      case "assistant":
        return {
          role: "assistant",
          content:
            message.content === null || message.content === undefined
              ? null
              : contentToText(message.content),
          ...name,
          ...(message.tool_calls !== undefined
            ? {
                tool_calls: message.tool_calls.map((toolCall) => ({
                  id: toolCall.id,
                  type: "function" as const,
                  function: {
                    name: toolCall.function.name,
                    arguments: toolCall.function.arguments,
                  },
                })),
              }
            : {}),
        };
      case "tool":
        return {
          role: "tool",
          content: contentToText(message.content),
          tool_call_id: message.tool_call_id ?? "",
        };
    }
  }

  private toUserContent(
    content: Content | null | undefined,
  ): string | ChatCompletionContentPart[] {
    if (content === null || content === undefined) {
      return "";
    }
    if (typeof content === "string") {
      return content;
    }
    return content.flatMap((block): ChatCompletionContentPart[] => {
      switch (block.type) {
        case "text":
          return [{ type: "text", text: block.text }];
        case "image_url":
          return [
            {
              type: "image_url",
              image_url: {
                url: block.image_url.url,
                ...(block.image_url.detail !== undefined
                  ? { detail: block.image_url.detail }
                  : {}),
              },
            },
          ];
        case "tool_use":
          // Tool use belongs on assistant turns; a user turn has no slot for it
          logger.debug(
            { toolUseId: block.id },
            "[OpenAIAdapter] dropping tool_use block from user message",
          );
          return [];
      }
    });
  }

  private toOpenAiTool(tool: Canonical.Types.Tool): ChatCompletionTool {
    return {
      type: "function",
      function: {
        name: tool.function.name,
        description: tool.function.description,
        parameters: tool.function.parameters,
      },
    };
  }

  // ===========================================================================
  // BLOCKING
  // ===========================================================================

  async chatCompletion(
    request: ChatCompletionRequest,
  ): Promise<ChatCompletionResponse> {
    if (request.stream === true) {
      throw new RequestValidationError(
        "chatCompletion does not accept stream=true; use streamChatCompletion",
      );
    }
    const completion = await this.client.createCompletion({
      ...this.toProviderPayload(request),
      stream: false,
    });
    return this.toCanonicalResponse(completion);
  }

  private toCanonicalResponse(completion: ChatCompletion): ChatCompletionResponse {
    return {
      id: completion.id,
      object: "chat.completion",
      created: completion.created,
      model: completion.model,
      choices: completion.choices.map((choice) => {
        const toolCalls = (choice.message.tool_calls ?? []).flatMap(
          (toolCall): ToolCall[] =>
            toolCall.type === "function"
              ? [
                  {
                    id: toolCall.id,
                    type: "function",
                    function: {
                      name: toolCall.function.name,
                      arguments: toolCall.function.arguments,
                    },
                  },
                ]
              : [],
        );
        return {
          index: choice.index,
          message: {
            role: "assistant" as const,
            content: choice.message.content ?? "",
            ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
          },
          finish_reason: choice.finish_reason,
        };
      }),
      ...(completion.usage ? { usage: toUsage(completion.usage) } : {}),
    };
  }

  // ===========================================================================
  // STREAMING
  // ===========================================================================

  async *streamChatCompletion(
    request: ChatCompletionRequest,
  ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
    let template = {
      id: `chatcmpl-${randomUUID()}`,
      created: Math.floor(Date.now() / 1000),
      model: this.modelId,
    };

    const source = this.client.createCompletionStream({
      ...this.toProviderPayload(request),
      stream: true,
    });
    const translate = async function* (
      adapter: OpenAIAdapter,
    ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
      for await (const chunk of source) {
        template = { id: chunk.id, created: chunk.created, model: chunk.model };
        yield adapter.toCanonicalChunk(chunk);
      }
    };

    yield* finalizeChunkStream(translate(this), () => makeFinishChunk(template));
  }

  /**
   * Tool-call deltas keep their integer index: a call's id and name arrive
   * once, its arguments across later deltas with the same index.
   */
  private toCanonicalChunk(chunk: OpenAiChatCompletionChunk): ChatCompletionChunk {
    return {
      id: chunk.id,
      object: "chat.completion.chunk",
      created: chunk.created,
      model: chunk.model,
      choices: chunk.choices.map((choice) => {
        const toolCalls = (choice.delta.tool_calls ?? []).map(
          (toolCall): ToolCallDelta => ({
            index: toolCall.index,
            ...(toolCall.id !== undefined ? { id: toolCall.id } : {}),
            ...(toolCall.type !== undefined ? { type: toolCall.type } : {}),
            ...(toolCall.function !== undefined
              ? {
                  function: {
                    ...(toolCall.function.name !== undefined
                      ? { name: toolCall.function.name }
                      : {}),
                    ...(toolCall.function.arguments !== undefined
                      ? { arguments: toolCall.function.arguments }
                      : {}),
                  },
                }
              : {}),
          }),
        );
        return {
          index: choice.index,
          delta: {
            ...(choice.delta.role === "assistant"
              ? { role: "assistant" as const }
              : {}),
            ...(typeof choice.delta.content === "string"
              ? { content: choice.delta.content }
              : {}),
            ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
          },
          finish_reason: choice.finish_reason,
        };
      }),
      ...(chunk.usage ? { usage: toUsage(chunk.usage) } : {}),
    };
  }
}

function toUsage(usage: {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}): Usage {
  return {
    prompt_tokens: usage.prompt_tokens,
    completion_tokens: usage.completion_tokens,
    total_tokens: usage.total_tokens,
  };
}
