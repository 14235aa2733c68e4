/**
 * Amazon Titan Text: one flat `inputText` prompt with User/Bot turns
 *
 * @see https://docs.aws.amazon.com/bedrock/latest/userguide/model-parameters-titan-text.html
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

export const TITAN_PROMPT_TEMPLATE: RolePrefixTemplate = {
  system: "System: ",
  user: "User: ",
  assistant: "Bot: ",
  tool: (name) => `User (Tool Response - ${name ?? "unknown_tool"}): `,
  separator: "\n",
  cue: "Bot:",
};

export class TitanStrategy extends BaseBedrockStrategy {
  readonly family = "titan";

  protected readonly finishReasons = {
    finish: "stop",
    length: "length",
    max_tokens: "length",
    content_filtered: "content_filter",
    stop_sequence: "stop",
  } as const;

  protected buildPayload(request: ChatCompletionRequest): ProviderPayload {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    const stopSequences = this.stopSequences(request);
    return {
      inputText: renderRolePrefixedPrompt(
        TITAN_PROMPT_TEMPLATE,
        systemPrompt,
        messages,
      ),
      textGenerationConfig: {
        maxTokenCount: this.maxTokens(request),
        temperature: this.temperature(request),
        ...(request.top_p !== undefined ? { topP: request.top_p } : {}),
        ...(stopSequences ? { stopSequences } : {}),
      },
    };
  }

  parseResponse(response: unknown, _request: ChatCompletionRequest) {
    const result = this.requireFirst(readArray(response, "results"), "results");
    return this.buildResponse({
      text: readString(result, "outputText") ?? "",
      finishReason: this.mapFinishReason(readValue(result, "completionReason")),
      promptTokens: readNumber(response, "inputTextTokenCount") ?? 0,
      completionTokens: readNumber(result, "tokenCount") ?? 0,
    });
  }

  handleStreamChunk(
    event: unknown,
    _request: ChatCompletionRequest,
    context: StreamContext,
  ) {
    return this.buildChunk(context, {
      content: readString(event, "outputText"),
      finishReason: this.mapFinishReason(readValue(event, "completionReason")),
    });
  }
}
