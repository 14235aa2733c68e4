/**
 * AI21 Jurassic: flat prompt in, `completions[].data` out
 */
import type { Canonical, ProviderPayload, StreamContext } from "@/types";
import {
  readArray,
  readString,
  readTokenCount,
  readValue,
} from "../utils/provider-json";
import { BaseBedrockStrategy } from "./base";
import {
  type RolePrefixTemplate,
  renderRolePrefixedPrompt,
} from "./prompt-templates";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;

export const AI21_PROMPT_TEMPLATE: RolePrefixTemplate = {
  system: "System: ",
  user: "User: ",
  assistant: "Assistant: ",
  tool: () => "User (Tool Response): ",
  separator: "\n\n",
  cue: "Assistant:",
};

export class Ai21Strategy extends BaseBedrockStrategy {
  readonly family = "ai21";

  protected readonly finishReasons = {
    endoftext: "stop",
    length: "length",
    stop: "stop",
  } as const;

  protected buildPayload(request: ChatCompletionRequest): ProviderPayload {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    const stopSequences = this.stopSequences(request);
    return {
      prompt: renderRolePrefixedPrompt(
        AI21_PROMPT_TEMPLATE,
        systemPrompt,
        messages,
      ),
      maxTokens: this.maxTokens(request),
      temperature: this.temperature(request),
      ...(request.top_p !== undefined ? { topP: request.top_p } : {}),
      ...(stopSequences ? { stopSequences } : {}),
    };
  }

  parseResponse(response: unknown, _request: ChatCompletionRequest) {
    const completion = this.requireFirst(
      readArray(response, "completions"),
      "completions",
    );
    return this.buildResponse({
      text: readString(completion, "data.text") ?? "",
      finishReason: this.mapFinishReason(
        readValue(completion, "finishReason.reason"),
      ),
      promptTokens: readTokenCount(response, "prompt.tokens"),
      completionTokens: readTokenCount(completion, "data.tokens"),
    });
  }

  handleStreamChunk(
    event: unknown,
    _request: ChatCompletionRequest,
    context: StreamContext,
  ) {
    return this.buildChunk(context, {
      content: readString(event, "completion.data.text"),
      finishReason: this.mapFinishReason(
        readValue(event, "completion.finishReason.reason"),
      ),
    });
  }
}
