/**
 * Mistral instruct models
 *
 * @see https://docs.aws.amazon.com/bedrock/latest/userguide/model-parameters-mistral-text-completion.html
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
  type InstructionTemplate,
  renderInstructionPrompt,
} from "./prompt-templates";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;

export const MISTRAL_PROMPT_TEMPLATE: InstructionTemplate = {
  open: (systemPrompt) =>
    systemPrompt === null ? "<s>[INST] " : `<s>[INST] ${systemPrompt}\n\n`,
  assistant: (text) => ` ${text}</s>`,
};

export class MistralStrategy extends BaseBedrockStrategy {
  readonly family = "mistral";

  protected readonly finishReasons = {
    stop: "stop",
    length: "length",
    model_length: "length",
  } as const;

  protected buildPayload(request: ChatCompletionRequest): ProviderPayload {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    const stop = this.stopSequences(request);
    return {
      prompt: renderInstructionPrompt(
        MISTRAL_PROMPT_TEMPLATE,
        systemPrompt,
        messages,
      ),
      max_tokens: this.maxTokens(request),
      temperature: this.temperature(request),
      ...(request.top_p !== undefined ? { top_p: request.top_p } : {}),
      ...(request.top_k !== undefined ? { top_k: request.top_k } : {}),
      ...(stop ? { stop } : {}),
    };
  }

  parseResponse(response: unknown, _request: ChatCompletionRequest) {
    const output = this.requireFirst(readArray(response, "outputs"), "outputs");
    return this.buildResponse({
      text: readString(output, "text") ?? "",
      finishReason: this.mapFinishReason(readValue(output, "stop_reason")),
      promptTokens: readNumber(response, "usage.prompt_tokens") ?? 0,
      completionTokens: readNumber(response, "usage.completion_tokens") ?? 0,
    });
  }

  handleStreamChunk(
    event: unknown,
    _request: ChatCompletionRequest,
    context: StreamContext,
  ) {
    const output = readArray(event, "outputs")[0];
    return this.buildChunk(context, {
      content: readString(output, "text"),
      finishReason: this.mapFinishReason(readValue(output, "stop_reason")),
    });
  }
}
