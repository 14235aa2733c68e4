/**
 * Anthropic Claude on Bedrock (messages API)
 *
 * The only Bedrock family with native tool use: OpenAI tools map to Claude
 * tools, assistant tool_calls to `tool_use` blocks and tool-role messages to
 * `tool_result` blocks on a user turn.
 *
 * @see https://docs.aws.amazon.com/bedrock/latest/userguide/model-parameters-anthropic-claude-messages.html
 */
import { randomUUID } from "node:crypto";
import { LLMIntegrationError, UnsupportedFeatureError } from "@/errors";
import {
  Bedrock,
  type Canonical,
  type ProviderPayload,
  type StreamContext,
} from "@/types";
import {
  contentToBlocks,
  contentToText,
  parseDataUrl,
  parseToolArguments,
} from "../utils/content";
import {
  readNumber,
  readString,
  readValue,
} from "../utils/provider-json";
import { BaseBedrockStrategy } from "./base";

// =============================================================================
// TYPE ALIASES
// =============================================================================

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type Message = Canonical.Types.Message;
type ContentBlock = Canonical.Types.ContentBlock;
type ToolCall = Canonical.Types.ToolCall;
type ClaudeMessage = Bedrock.Types.ClaudeMessage;
type ClaudeContentBlock = Bedrock.Types.ClaudeContentBlock;
type ClaudeTool = Bedrock.Types.ClaudeTool;
type ClaudeToolChoice = Bedrock.Types.ClaudeToolChoice;

export class ClaudeStrategy extends BaseBedrockStrategy {
  readonly family = "claude";
  protected readonly supportsTools = true;

  protected readonly finishReasons = {
    end_turn: "stop",
    max_tokens: "length",
    stop_sequence: "stop",
    tool_use: "tool_calls",
  } as const;

  // ---------------------------------------------------------------------------
  // Request
  // ---------------------------------------------------------------------------

  protected buildPayload(request: ChatCompletionRequest): ProviderPayload {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    const stopSequences = this.stopSequences(request);
    const toolsEnabled =
      request.tools !== undefined &&
      request.tools.length > 0 &&
      request.tool_choice !== "none";
    const toolChoice = toolsEnabled
      ? this.toClaudeToolChoice(request.tool_choice)
      : undefined;

    return {
      anthropic_version: Bedrock.Claude.ANTHROPIC_VERSION,
      max_tokens: this.maxTokens(request),
      messages: this.toClaudeMessages(messages),
      temperature: this.temperature(request),
      ...(systemPrompt !== null ? { system: systemPrompt } : {}),
      ...(request.top_p !== undefined ? { top_p: request.top_p } : {}),
      ...(request.top_k !== undefined ? { top_k: request.top_k } : {}),
      ...(stopSequences ? { stop_sequences: stopSequences } : {}),
      ...(toolsEnabled ? { tools: this.toClaudeTools(request) } : {}),
      ...(toolChoice ? { tool_choice: toolChoice } : {}),
    };
  }

  private toClaudeTools(request: ChatCompletionRequest): ClaudeTool[] {
    return (request.tools ?? []).map((tool) => ({
      name: tool.function.name,
      description: tool.function.description,
      input_schema: tool.function.parameters,
    }));
  }

  private toClaudeToolChoice(
    choice: ChatCompletionRequest["tool_choice"],
  ): ClaudeToolChoice | undefined {
    if (choice === undefined || choice === "none") {
      return undefined;
    }
    if (choice === "auto") {
      return { type: "auto" };
    }
    if (choice === "required") {
      return { type: "any" };
    }
    return { type: "tool", name: choice.function.name };
  }

  /**
   * Claude requires strictly alternating user / assistant turns, so
   * consecutive turns of the same role are merged into one.
   */
  private toClaudeMessages(messages: Message[]): ClaudeMessage[] {
    const result: { role: "user" | "assistant"; content: ClaudeContentBlock[] }[] =
      [];

    for (const message of messages) {
      const role = message.role === "assistant" ? "assistant" : "user";
      const blocks = this.toClaudeBlocks(message);
      if (blocks.length === 0) {
        continue;
      }
      const previous = result.at(-1);
      if (previous?.role === role) {
        previous.content.push(...blocks);
      } else {
        result.push({ role, content: blocks });
      }
    }
    return result;
  }

  private toClaudeBlocks(message: Message): ClaudeContentBlock[] {
    if (message.role === "tool") {
      const text = contentToText(message.content);
      if (message.tool_call_id === undefined) {
        return [{ type: "text", text: `Tool Response: ${text}` }];
      }
      return [
        { type: "tool_result", tool_use_id: message.tool_call_id, content: text },
      ];
    }

    const blocks = contentToBlocks(message.content).flatMap((block) =>
      this.toClaudeBlock(block),
    );
    for (const toolCall of message.tool_calls ?? []) {
      blocks.push({
        type: "tool_use",
        id: toolCall.id,
        name: toolCall.function.name,
        input: parseToolArguments(toolCall.function.arguments),
      });
    }
    return blocks;
  }

  private toClaudeBlock(block: ContentBlock): ClaudeContentBlock[] {
    switch (block.type) {
      case "text":
        return block.text.length > 0 ? [{ type: "text", text: block.text }] : [];
      case "tool_use":
        return [block];
      case "image_url": {
        const image = parseDataUrl(block.image_url.url);
        if (image === null) {
          throw new UnsupportedFeatureError(
            "Claude on Bedrock only accepts images as base64 data URLs",
            { code: "unsupported_image_url" },
          );
        }
        return [
          {
            type: "image",
            source: {
              type: "base64",
              media_type: image.mediaType,
              data: image.data,
            },
          },
        ];
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Response
  // ---------------------------------------------------------------------------

  /**
   * Finish reason priority: a provider `stop_reason` wins (`tool_use` is
   * always `tool_calls`); without one, any tool_use block means
   * `tool_calls`, otherwise `stop`.
   */
  parseResponse(response: unknown, _request: ChatCompletionRequest) {
    const content = readValue(response, "content");
    if (!Array.isArray(content)) {
      throw new LLMIntegrationError(
        `claude response for ${this.modelId} contained no content`,
        { code: "empty_response" },
      );
    }

    const texts: string[] = [];
    const toolCalls: ToolCall[] = [];
    for (const block of content) {
      const type = readString(block, "type");
      if (type === "text") {
        texts.push(readString(block, "text") ?? "");
      } else if (type === "tool_use") {
        toolCalls.push({
          id: readString(block, "id") ?? `toolu_${randomUUID()}`,
          type: "function",
          function: {
            name: readString(block, "name") ?? "",
            arguments: JSON.stringify(readValue(block, "input") ?? {}),
          },
        });
      }
    }

    return this.buildResponse({
      id: readString(response, "id"),
      text: texts.join(""),
      toolCalls,
      finishReason:
        this.mapFinishReason(readValue(response, "stop_reason")) ??
        (toolCalls.length > 0 ? "tool_calls" : "stop"),
      promptTokens: readNumber(response, "usage.input_tokens") ?? 0,
      completionTokens: readNumber(response, "usage.output_tokens") ?? 0,
    });
  }

  // ---------------------------------------------------------------------------
  // Stream
  // ---------------------------------------------------------------------------

  /**
   * Tool-call deltas carry the Claude content block index; callers that
   * need dense OpenAI indices remap them per stream.
   */
  handleStreamChunk(
    event: unknown,
    _request: ChatCompletionRequest,
    context: StreamContext,
  ) {
    const index = readNumber(event, "index") ?? 0;

    switch (readString(event, "type")) {
      case "content_block_start": {
        if (readString(event, "content_block.type") !== "tool_use") {
          return this.buildChunk(context, {});
        }
        return this.buildChunk(context, {
          toolCalls: [
            {
              index,
              id: readString(event, "content_block.id"),
              type: "function",
              function: {
                name: readString(event, "content_block.name"),
                arguments: "",
              },
            },
          ],
        });
      }
      case "content_block_delta": {
        if (readString(event, "delta.type") === "input_json_delta") {
          return this.buildChunk(context, {
            toolCalls: [
              {
                index,
                function: {
                  arguments: readString(event, "delta.partial_json") ?? "",
                },
              },
            ],
          });
        }
        return this.buildChunk(context, {
          content: readString(event, "delta.text"),
        });
      }
      case "message_delta":
        return this.buildChunk(context, {
          finishReason: this.mapFinishReason(
            readValue(event, "delta.stop_reason"),
          ),
        });
      default:
        // message_start, content_block_stop, message_stop, ping
        return this.buildChunk(context, {});
    }
  }
}
