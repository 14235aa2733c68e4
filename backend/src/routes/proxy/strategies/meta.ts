/**
 * Meta Llama instruct models: Llama-2 style `[INST]` prompt
 *
 * @see https://docs.aws.amazon.com/bedrock/latest/userguide/model-parameters-meta.html
 */
import type { Canonical, ProviderPayload, StreamContext } from "@/types";
import { LLMIntegrationError } from "@/errors";
import { readNumber, readString, readValue } from "../utils/provider-json";
import { BaseBedrockStrategy } from "./base";
import {
  type InstructionTemplate,
  renderInstructionPrompt,
} from "./prompt-templates";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;

export const LLAMA_PROMPT_TEMPLATE: InstructionTemplate = {
  open: (systemPrompt) =>
    systemPrompt === null
      ? "<s>[INST] "
      : `<s>[INST] <<SYS>>\n${systemPrompt}\n<</SYS>>\n\n`,
  assistant: (text) => ` ${text} </s>`,
};

export class MetaStrategy extends BaseBedrockStrategy {
  readonly family = "meta";

  protected readonly finishReasons = {
    stop: "stop",
    length: "length",
    max_gen_len: "length",
  } as const;

  protected buildPayload(request: ChatCompletionRequest): ProviderPayload {
    const { systemPrompt, messages } = this.splitSystemPrompt(request.messages);
    return {
      prompt: renderInstructionPrompt(
        LLAMA_PROMPT_TEMPLATE,
        systemPrompt,
        messages,
      ),
      max_gen_len: this.maxTokens(request),
      temperature: this.temperature(request),
      ...(request.top_p !== undefined ? { top_p: request.top_p } : {}),
    };
  }

  parseResponse(response: unknown, _request: ChatCompletionRequest) {
    const generation = readString(response, "generation");
    if (generation === undefined) {
      throw new LLMIntegrationError(
        `meta response for ${this.modelId} contained no generation`,
        { code: "empty_response" },
      );
    }
    return this.buildResponse({
      text: generation,
      finishReason: this.mapFinishReason(readValue(response, "stop_reason")),
      promptTokens: readNumber(response, "prompt_token_count") ?? 0,
      completionTokens: readNumber(response, "generation_token_count") ?? 0,
    });
  }

  handleStreamChunk(
    event: unknown,
    _request: ChatCompletionRequest,
    context: StreamContext,
  ) {
    return this.buildChunk(context, {
      content: readString(event, "generation"),
      finishReason: this.mapFinishReason(readValue(event, "stop_reason")),
    });
  }
}
