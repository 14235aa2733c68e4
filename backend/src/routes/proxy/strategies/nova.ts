/**
 * Amazon Nova (messages-v1 schema)
 *
 * Stream events come either keyed by event name
 * (`{ contentBlockDelta: { delta: { text } } }`) or tagged with `type`
 * (`{ type: "contentBlockDelta", delta: { text } }`); both are accepted.
 *
 * @see https://docs.aws.amazon.com/nova/latest/userguide/complete-request-schema.html
 */
import type { Canonical, ProviderPayload, StreamContext } from "@/types";
import { LLMIntegrationError } from "@/errors";
import { contentToText } from "../utils/content";
import {
  readArray,
  readNumber,
  readRecord,
  readString,
  readValue,
} from "../utils/provider-json";
import { BaseBedrockStrategy } from "./base";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type Message = Canonical.Types.Message;

export const NOVA_SCHEMA_VERSION = "messages-v1";

interface NovaMessage {
  role: "user" | "assistant";
  content: { text: string }[];
}

export class NovaStrategy extends BaseBedrockStrategy {
  readonly family = "nova";

  protected readonly finishReasons = {
    end_turn: "stop",
    max_tokens: "length",
    stop_sequence: "stop",
    content_filtered: "content_filter",
  } as const;

  protected buildPayload(request: ChatCompletionRequest): ProviderPayload {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    const stopSequences = this.stopSequences(request);
    return {
      schemaVersion: NOVA_SCHEMA_VERSION,
      messages: this.toNovaMessages(messages),
      ...(systemPrompt !== null ? { system: [{ text: systemPrompt }] } : {}),
      inferenceConfig: {
        maxTokens: this.maxTokens(request),
        temperature: this.temperature(request),
        ...(request.top_p !== undefined ? { topP: request.top_p } : {}),
        ...(request.top_k !== undefined ? { topK: request.top_k } : {}),
        ...(stopSequences ? { stopSequences } : {}),
      },
    };
  }

  parseResponse(response: unknown, _request: ChatCompletionRequest) {
    const message = readRecord(response, "output.message");
    if (message === undefined) {
      throw new LLMIntegrationError(
        `nova response for ${this.modelId} contained no output message`,
        { code: "empty_response" },
      );
    }
    const text = readArray(message, "content")
      .map((block) => readString(block, "text") ?? "")
      .join("");
    return this.buildResponse({
      text,
      finishReason: this.mapFinishReason(readValue(response, "stopReason")),
      promptTokens: readNumber(response, "usage.inputTokens") ?? 0,
      completionTokens: readNumber(response, "usage.outputTokens") ?? 0,
    });
  }

  handleStreamChunk(
    event: unknown,
    _request: ChatCompletionRequest,
    context: StreamContext,
  ) {
    const type = readString(event, "type");

    const delta =
      readRecord(event, "contentBlockDelta") ??
      (type === "contentBlockDelta" ? event : undefined);
    if (delta !== undefined) {
      return this.buildChunk(context, {
        content: readString(delta, "delta.text"),
      });
    }

    const stop =
      readRecord(event, "messageStop") ??
      (type === "messageStop" ? event : undefined);
    if (stop !== undefined) {
      return this.buildChunk(context, {
        finishReason:
          this.mapFinishReason(readValue(stop, "stopReason")) ?? "stop",
      });
    }

    return this.buildChunk(context, {});
  }

  /**
   * Nova requires alternating turns; consecutive same-role turns are merged
   * and tool results are replayed as user text.
   */
  private toNovaMessages(messages: Message[]): NovaMessage[] {
    const result: NovaMessage[] = [];
    for (const message of messages) {
      const role = message.role === "assistant" ? "assistant" : "user";
      const body = contentToText(message.content);
      const text = message.role === "tool" ? `Tool Response: ${body}` : body;
      const previous = result.at(-1);
      if (previous?.role === role) {
        previous.content.push({ text });
      } else {
        result.push({ role, content: [{ text }] });
      }
    }
    return result;
  }
}
