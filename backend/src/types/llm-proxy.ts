/* SPDX-License-Identifier: MIT */
import type { BedrockModelFamily, SupportedProvider } from "@shared";
import type Canonical from "./canonical";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type ChatCompletionResponse = Canonical.Types.ChatCompletionResponse;
type ChatCompletionChunk = Canonical.Types.ChatCompletionChunk;

/**
 * Provider-shaped JSON body sent to a backend model
 */
export type ProviderPayload = Record<string, unknown>;

/**
 * Invokes a backend model with a provider-shaped body.
 *
 * Retry, backoff and auth live behind this interface; implementations
 * translate SDK failures into the gateway error taxonomy.
 */
export interface ProviderInvoker {
  invoke(modelId: string, body: ProviderPayload): Promise<unknown>;
  /**
   * Each yielded value is one decoded provider event. Returning early from
   * the iterator must release the underlying connection.
   */
  invokeStream(modelId: string, body: ProviderPayload): AsyncIterable<unknown>;
}

/**
 * Uniform adapter contract the routing layer talks to
 */
export interface ChatAdapter<TPayload = unknown> {
  readonly provider: SupportedProvider;
  readonly modelId: string;

  /** Build the provider-shaped body without calling the provider */
  toProviderPayload(request: ChatCompletionRequest): TPayload;

  /** Blocking completion; rejects requests with `stream: true` */
  chatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;

  /**
   * Streaming completion. Only chunks carrying content or a finish_reason
   * are yielded, and exactly one yielded chunk carries a finish_reason.
   */
  streamChatCompletion(
    request: ChatCompletionRequest,
  ): AsyncGenerator<ChatCompletionChunk, void, undefined>;
}

/**
 * Per-stream identity shared by every chunk of one stream
 */
export interface StreamContext {
  streamId: string;
  created: number;
}

/**
 * Per Bedrock model family payload builder / response parser / event translator
 */
export interface ProviderStrategy {
  readonly family: BedrockModelFamily;

  prepareRequestPayload(request: ChatCompletionRequest): ProviderPayload;

  parseResponse(
    response: unknown,
    request: ChatCompletionRequest,
  ): ChatCompletionResponse;

  /**
   * Stateless per event. Metadata-only events translate to a chunk with an
   * empty choice list.
   */
  handleStreamChunk(
    event: unknown,
    request: ChatCompletionRequest,
    context: StreamContext,
  ): ChatCompletionChunk;
}
