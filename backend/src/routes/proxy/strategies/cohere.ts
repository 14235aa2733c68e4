/**
 * Cohere Command (text generation API)
 */
import type { Canonical, ProviderPayload, StreamContext } from "@/types";
import {
  readArray,
  readNumber,
  readString,
  readValue,
} from "../utils/provider-json";
import { BaseBedrockStrategy } from "./base";
import {
  type RolePrefixTemplate,
  renderRolePrefixedPrompt,
} from "./prompt-templates";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;

export const COHERE_PROMPT_TEMPLATE: RolePrefixTemplate = {
  system: "System: ",
  user: "User: ",
  assistant: "Chatbot: ",
  tool: () => "User (Tool Response): ",
  separator: "\n\n",
  cue: "Chatbot:",
};

export class CohereStrategy extends BaseBedrockStrategy {
  readonly family = "cohere";

  protected readonly finishReasons = {
    COMPLETE: "stop",
    MAX_TOKENS: "length",
    ERROR: "stop",
    ERROR_TOXIC: "content_filter",
  } as const;

  protected normalizeFinishReasonKey(raw: string): string {
    return raw.toUpperCase();
  }

  protected buildPayload(request: ChatCompletionRequest): ProviderPayload {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    const stopSequences = this.stopSequences(request);
    return {
      prompt: renderRolePrefixedPrompt(
        COHERE_PROMPT_TEMPLATE,
        systemPrompt,
        messages,
      ),
      max_tokens: this.maxTokens(request),
      temperature: this.temperature(request),
      ...(request.top_p !== undefined ? { p: request.top_p } : {}),
      ...(request.top_k !== undefined ? { k: request.top_k } : {}),
      ...(stopSequences ? { stop_sequences: stopSequences } : {}),
    };
  }

  parseResponse(response: unknown, _request: ChatCompletionRequest) {
    const generation = this.requireFirst(
      readArray(response, "generations"),
      "generations",
    );
    return this.buildResponse({
      id: readString(response, "id"),
      text: readString(generation, "text") ?? "",
      finishReason: this.mapFinishReason(readValue(generation, "finish_reason")),
      promptTokens: readNumber(response, "meta.billed_units.input_tokens") ?? 0,
      completionTokens:
        readNumber(response, "meta.billed_units.output_tokens") ?? 0,
    });
  }

  handleStreamChunk(
    event: unknown,
    _request: ChatCompletionRequest,
    context: StreamContext,
  ) {
    return this.buildChunk(context, {
      content: readString(event, "text"),
      finishReason: this.mapFinishReason(readValue(event, "finish_reason")),
    });
  }
}
