/**
 * Shared machinery for per-family Bedrock strategies.
 *
 * A Strategy owns one model family's wire shape: how the canonical request
 * becomes a provider body, how the provider's result container becomes a
 * canonical response, and how one provider stream event becomes one chunk.
 */
import { randomUUID } from "node:crypto";
import type { BedrockModelFamily, ModelDefaultsKey } from "@shared";
import type { ProviderDefaults } from "@/config";
import { LLMIntegrationError, UnsupportedFeatureError } from "@/errors";
import type {
  Canonical,
  ProviderPayload,
  ProviderStrategy,
  StreamContext,
} from "@/types";
import { contentToText, toStopSequences } from "../utils/content";

// =============================================================================
// TYPE ALIASES
// =============================================================================

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type ChatCompletionResponse = Canonical.Types.ChatCompletionResponse;
type ChatCompletionChunk = Canonical.Types.ChatCompletionChunk;
type FinishReason = Canonical.Types.FinishReason;
type FinishReasonValue = Canonical.Types.FinishReasonValue;
type Message = Canonical.Types.Message;
type ToolCall = Canonical.Types.ToolCall;
type ToolCallDelta = Canonical.Types.ToolCallDelta;

export interface ResponseParts {
  id?: string;
  text: string;
  toolCalls?: ToolCall[];
  finishReason: FinishReasonValue | null;
  promptTokens: number;
  completionTokens: number;
}

export interface ChunkParts {
  content?: string;
  toolCalls?: ToolCallDelta[];
  finishReason?: FinishReasonValue | null;
}

export interface SplitConversation {
  systemPrompt: string | null;
  messages: Message[];
}

export abstract class BaseBedrockStrategy implements ProviderStrategy {
  abstract readonly family: BedrockModelFamily;
  readonly modelId: string;
  protected readonly defaults: ProviderDefaults;

  /** Provider stop vocabulary, keyed by `normalizeFinishReasonKey` output */
  protected abstract readonly finishReasons: Readonly<
    Record<string, FinishReason>
  >;

  /** Families without tool support reject tools before building a payload */
  protected readonly supportsTools: boolean = false;

  constructor(modelId: string, defaults: ProviderDefaults) {
    this.modelId = modelId;
    this.defaults = defaults;
  }

  prepareRequestPayload(request: ChatCompletionRequest): ProviderPayload {
    if (!this.supportsTools) {
      this.assertNoTools(request);
    }
    return this.buildPayload(request);
  }

  protected abstract buildPayload(
    request: ChatCompletionRequest,
  ): ProviderPayload;

  abstract parseResponse(
    response: unknown,
    request: ChatCompletionRequest,
  ): ChatCompletionResponse;

  abstract handleStreamChunk(
    event: unknown,
    request: ChatCompletionRequest,
    context: StreamContext,
  ): ChatCompletionChunk;

  // ---------------------------------------------------------------------------
  // Request helpers
  // ---------------------------------------------------------------------------

  /**
   * Pull every system message out of the conversation. Several system
   * messages are joined with a newline, in order.
   */
  protected splitSystemPrompt(messages: Message[]): SplitConversation {
    const system: string[] = [];
    const rest: Message[] = [];
    for (const message of messages) {
      if (message.role === "system") {
        system.push(contentToText(message.content));
      } else {
        rest.push(message);
      }
    }
    return {
      systemPrompt: system.length > 0 ? system.join("\n") : null,
      messages: rest,
    };
  }

  protected maxTokens(request: ChatCompletionRequest): number {
    return request.max_tokens ?? this.defaults.get(this.defaultsKey).maxTokens;
  }

  protected temperature(request: ChatCompletionRequest): number {
    return (
      request.temperature ?? this.defaults.get(this.defaultsKey).temperature
    );
  }

  protected stopSequences(request: ChatCompletionRequest): string[] | undefined {
    return toStopSequences(request.stop);
  }

  protected get defaultsKey(): ModelDefaultsKey {
    return this.family;
  }

  protected assertNoTools(request: ChatCompletionRequest): void {
    if (request.tools !== undefined && request.tools.length > 0) {
      throw new UnsupportedFeatureError(
        `Model family '${this.family}' does not support tools (model: ${this.modelId})`,
        { code: "tools_not_supported" },
      );
    }
    if (request.tool_choice !== undefined) {
      throw new UnsupportedFeatureError(
        `Model family '${this.family}' does not support tool_choice (model: ${this.modelId})`,
        { code: "tools_not_supported" },
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Response helpers
  // ---------------------------------------------------------------------------

  protected normalizeFinishReasonKey(raw: string): string {
    return raw.toLowerCase();
  }

  /**
   * Known provider reasons map to the canonical set; unknown ones pass
   * through unchanged. Absent or empty values are `null`.
   */
  protected mapFinishReason(raw: unknown): FinishReasonValue | null {
    if (typeof raw !== "string" || raw.length === 0) {
      return null;
    }
    const key = this.normalizeFinishReasonKey(raw);
    return Object.hasOwn(this.finishReasons, key)
      ? this.finishReasons[key]
      : raw;
  }

  protected requireFirst(items: unknown[], container: string): unknown {
    if (items.length === 0) {
      throw new LLMIntegrationError(
        `${this.family} response for ${this.modelId} contained no ${container}`,
        { code: "empty_response" },
      );
    }
    return items[0];
  }

  protected buildResponse(parts: ResponseParts): ChatCompletionResponse {
    const toolCalls =
      parts.toolCalls && parts.toolCalls.length > 0
        ? parts.toolCalls
        : undefined;
    return {
      id: parts.id ?? `bedrock-${this.family}-${randomUUID()}`,
      object: "chat.completion",
      created: Math.floor(Date.now() / 1000),
      model: this.modelId,
      choices: [
        {
          index: 0,
          message: {
            role: "assistant",
            content: parts.text,
            ...(toolCalls ? { tool_calls: toolCalls } : {}),
          },
          finish_reason: parts.finishReason,
        },
      ],
      usage: {
        prompt_tokens: parts.promptTokens,
        completion_tokens: parts.completionTokens,
        total_tokens: parts.promptTokens + parts.completionTokens,
      },
    };
  }

  /**
   * One chunk per provider event. Events with no text, no tool-call delta
   * and no finish reason produce an empty choice list.
   */
  protected buildChunk(
    context: StreamContext,
    parts: ChunkParts,
  ): ChatCompletionChunk {
    const hasContent = parts.content !== undefined && parts.content !== "";
    const hasToolCalls =
      parts.toolCalls !== undefined && parts.toolCalls.length > 0;
    const finishReason = parts.finishReason ?? null;

    const base = {
      id: context.streamId,
      object: "chat.completion.chunk" as const,
      created: context.created,
      model: this.modelId,
    };

    if (!hasContent && !hasToolCalls && finishReason === null) {
      return { ...base, choices: [] };
    }

    return {
      ...base,
      choices: [
        {
          index: 0,
          delta: {
            ...(hasContent || hasToolCalls ? { role: "assistant" as const } : {}),
            ...(hasContent ? { content: parts.content } : {}),
            ...(hasToolCalls ? { tool_calls: parts.toolCalls } : {}),
          },
          finish_reason: finishReason,
        },
      ],
    };
  }
}

export type BedrockStrategyClass = new (
  modelId: string,
  defaults: ProviderDefaults,
) => BaseBedrockStrategy;
