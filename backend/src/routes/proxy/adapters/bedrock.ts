/**
 * Bedrock adapter: one instance per model id, delegating wire conversion to
 * the Strategy selected by the id's family prefix.
 */
import { randomUUID } from "node:crypto";
import type { BedrockModelFamily } from "@shared";
import type { ProviderDefaults } from "@/config";
import { ModelNotFoundError, RequestValidationError } from "@/errors";
import logger from "@/logging";
import type {
  Canonical,
  ChatAdapter,
  ProviderInvoker,
  ProviderPayload,
  ProviderStrategy,
  StreamContext,
} from "@/types";
import {
  BEDROCK_STRATEGY_PREFIXES,
  findStrategyEntry,
} from "../strategies";
import { finalizeChunkStream, makeFinishChunk } from "./chunk-stream";

// =============================================================================
// TYPE ALIASES
// =============================================================================

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type ChatCompletionResponse = Canonical.Types.ChatCompletionResponse;
type ChatCompletionChunk = Canonical.Types.ChatCompletionChunk;

export interface BedrockAdapterOptions {
  invoker: ProviderInvoker;
  defaults: ProviderDefaults;
}

export const SUPPORTED_BEDROCK_PREFIXES = BEDROCK_STRATEGY_PREFIXES.map(
  ({ prefix }) => prefix,
);

export class BedrockAdapter implements ChatAdapter<ProviderPayload> {
  readonly provider = "bedrock" as const;
  readonly modelId: string;
  readonly family: BedrockModelFamily;
  private readonly strategy: ProviderStrategy;
  private readonly invoker: ProviderInvoker;

  constructor(modelId: string, options: BedrockAdapterOptions) {
    const entry = findStrategyEntry(modelId);
    if (entry === undefined) {
      throw new ModelNotFoundError(
        `Unsupported Bedrock model '${modelId}'. Supported prefixes: ${SUPPORTED_BEDROCK_PREFIXES.join(", ")}`,
        { code: "model_not_found" },
      );
    }
    this.modelId = modelId;
    this.family = entry.family;
    this.strategy = new entry.strategy(modelId, options.defaults);
    this.invoker = options.invoker;
  }

  toProviderPayload(request: ChatCompletionRequest): ProviderPayload {
    return this.strategy.prepareRequestPayload(request);
  }

  async chatCompletion(
    request: ChatCompletionRequest,
  ): Promise<ChatCompletionResponse> {
    if (request.stream === true) {
      throw new RequestValidationError(
        "chatCompletion does not accept stream=true; use streamChatCompletion",
      );
    }
    const payload = this.toProviderPayload(request);

    logger.debug(
      { modelId: this.modelId, family: this.family },
      "[BedrockAdapter] invoking model",
    );
    const response = await this.invoker.invoke(this.modelId, payload);
    return this.strategy.parseResponse(response, request);
  }

  async *streamChatCompletion(
    request: ChatCompletionRequest,
  ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
    const streamRequest: ChatCompletionRequest = { ...request, stream: true };
    const payload = this.toProviderPayload(streamRequest);
    const context: StreamContext = {
      streamId: `br-${this.family}-${randomUUID()}`,
      created: Math.floor(Date.now() / 1000),
    };

    logger.debug(
      { modelId: this.modelId, family: this.family, streamId: context.streamId },
      "[BedrockAdapter] invoking model with response stream",
    );

    yield* finalizeChunkStream(
      this.translateEvents(
        this.invoker.invokeStream(this.modelId, payload),
        streamRequest,
        context,
      ),
      () =>
        makeFinishChunk({
          id: context.streamId,
          created: context.created,
          model: this.modelId,
        }),
    );
  }

  /**
   * Strategy translation plus dense tool-call indices: providers index tool
   * calls by content block, OpenAI clients expect 0..n-1.
   */
  private async *translateEvents(
    events: AsyncIterable<unknown>,
    request: ChatCompletionRequest,
    context: StreamContext,
  ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
    // provider block index -> position in the tool_calls list
    const toolCallPositions = new Map<number, number>();

    for await (const event of events) {
      const chunk = this.strategy.handleStreamChunk(event, request, context);
      yield {
        ...chunk,
        choices: chunk.choices.map((choice) => {
          const toolCalls = choice.delta.tool_calls;
          if (toolCalls === undefined) {
            return choice;
          }
          return {
            ...choice,
            delta: {
              ...choice.delta,
              tool_calls: toolCalls.map((toolCall) => {
                let position = toolCallPositions.get(toolCall.index);
                if (position === undefined) {
                  position = toolCallPositions.size;
                  toolCallPositions.set(toolCall.index, position);
                }
                return { ...toolCall, index: position };
              }),
            },
          };
        }),
      };
    }
  }
}
