/**
 * Writer Palmyra. Finish reasons arrive either as a bare string or as
 * `{ reason }`.
 */
import type { Canonical, ProviderPayload, StreamContext } from "@/types";
import {
  readArray,
  readNumber,
  readString,
  readValue,
} from "../utils/provider-json";
import { BaseBedrockStrategy } from "./base";
import { renderRolePrefixedPrompt } from "./prompt-templates";
import { ASSISTANT_PROMPT_TEMPLATE } from "./stability";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;

export class WriterStrategy extends BaseBedrockStrategy {
  readonly family = "writer";

  protected readonly finishReasons = {
    stop: "stop",
    length: "length",
    maxtokens: "length",
    max_tokens: "length",
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
      maxTokens: this.maxTokens(request),
      temperature: this.temperature(request),
      ...(request.top_p !== undefined ? { topP: request.top_p } : {}),
      ...(request.top_k !== undefined ? { topK: request.top_k } : {}),
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
      finishReason: this.mapFinishReason(this.readFinishReason(completion)),
      promptTokens: readNumber(response, "usage.promptTokens") ?? 0,
      completionTokens: readNumber(response, "usage.completionTokens") ?? 0,
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
        this.readFinishReason(readValue(event, "completion")),
      ),
    });
  }

  private readFinishReason(container: unknown): string | undefined {
    return (
      readString(container, "finishReason") ??
      readString(container, "finishReason.reason")
    );
  }
}
