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

export const ASSISTANT_PROMPT_TEMPLATE: RolePrefixTemplate = {
  system: "System: ",
  user: "User: ",
  assistant: "Assistant: ",
  tool: () => "Tool Response: ",
  separator: "\n\n",
  cue: "Assistant:",
};

export class StabilityStrategy extends BaseBedrockStrategy {
  readonly family = "stability";

  protected readonly finishReasons = {
    stop: "stop",
    length: "length",
    content_filter: "content_filter",
  } as const;

  protected buildPayload(request: ChatCompletionRequest): ProviderPayload {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    const stopSequences = this.stopSequences(request);
    return {
      prompt: renderRolePrefixedPrompt(
        ASSISTANT_PROMPT_TEMPLATE,
        systemPrompt,
        messages,
      ),
      max_tokens: this.maxTokens(request),
      temperature: this.temperature(request),
      ...(request.top_p !== undefined ? { top_p: request.top_p } : {}),
      ...(request.top_k !== undefined ? { top_k: request.top_k } : {}),
      ...(stopSequences ? { stop_sequences: stopSequences } : {}),
    };
  }

  parseResponse(response: unknown, _request: ChatCompletionRequest) {
    const completion = this.requireFirst(
      readArray(response, "completions"),
      "completions",
    );
    return this.buildResponse({
      text: readString(completion, "text") ?? "",
      finishReason: this.mapFinishReason(readValue(completion, "finish_reason")),
      promptTokens: readNumber(response, "usage.prompt_tokens") ?? 0,
      completionTokens: readNumber(response, "usage.completion_tokens") ?? 0,
    });
  }

  handleStreamChunk(
    event: unknown,
    _request: ChatCompletionRequest,
    context: StreamContext,
  ) {
    return this.buildChunk(context, {
      content: readString(event, "completion.text"),
      finishReason: this.mapFinishReason(
        readValue(event, "completion.finish_reason"),
      ),
    });
  }
}
