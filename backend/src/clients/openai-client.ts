import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
} from "openai/resources/chat/completions";
import type { OpenAiConfig } from "@/config";
import {
  APIConnectionError,
  APIRequestError,
  APIServerError,
  ApiError,
  AuthenticationError,
  ConfigurationError,
  ModelNotFoundError,
  RateLimitError,
  StreamingError,
} from "@/errors";
import logger from "@/logging";

/**
 * Narrow seam over the OpenAI SDK's chat completions resource
 */
export interface OpenAiChatClient {
  createCompletion(
    params: ChatCompletionCreateParamsNonStreaming,
  ): Promise<ChatCompletion>;
  createCompletionStream(
    params: ChatCompletionCreateParamsStreaming,
  ): AsyncIterable<ChatCompletionChunk>;
}

/**
 * Translate an OpenAI SDK failure into the gateway error taxonomy.
 * Unclassified failures while consuming a stream are `StreamingError`.
 */
export function translateOpenAiError(
  error: unknown,
  { midStream = false }: { midStream?: boolean } = {},
): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  // Connection errors are APIError subclasses without a status
  if (error instanceof OpenAI.APIConnectionError) {
    return new APIConnectionError(`Could not reach OpenAI: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    const options = { code: error.code ?? undefined, cause: error };
    const status = error.status;
    if (status === 401 || status === 403) {
      return new AuthenticationError(error.message, options);
    }
    if (status === 404) {
      return new ModelNotFoundError(error.message, options);
    }
    if (status === 429) {
      return new RateLimitError(error.message, options);
    }
    if (status !== undefined && status >= 400 && status < 500) {
      return new APIRequestError(error.message, options);
    }
    return new APIServerError(error.message, options);
  }
  const message = error instanceof Error ? error.message : String(error);
  if (midStream) {
    return new StreamingError(`OpenAI stream failed: ${message}`, { cause: error });
  }
  return new APIServerError(`OpenAI call failed: ${message}`, { cause: error });
}

export interface OpenAiClientOptions {
  maxRetries: number;
}

export class OpenAiSdkChatClient implements OpenAiChatClient {
  private readonly client: OpenAI;

  constructor(client: OpenAI) {
    this.client = client;
  }

  static fromConfig(
    openai: OpenAiConfig,
    options: OpenAiClientOptions,
  ): OpenAiSdkChatClient {
    if (openai.apiKey === undefined) {
      throw new ConfigurationError(
        "OPENAI_API_KEY is not set; OpenAI models are unavailable",
        { code: "missing_openai_api_key" },
      );
    }
    logger.info(
      { baseUrl: openai.baseUrl ?? "default", apiKey: "***" },
      "[OpenAiSdkChatClient] creating client",
    );
    return new OpenAiSdkChatClient(
      new OpenAI({
        apiKey: openai.apiKey,
        baseURL: openai.baseUrl,
        maxRetries: options.maxRetries,
      }),
    );
  }

  async createCompletion(
    params: ChatCompletionCreateParamsNonStreaming,
  ): Promise<ChatCompletion> {
    try {
      return await this.client.chat.completions.create(params);
    } catch (error) {
      throw translateOpenAiError(error);
    }
  }

  async *createCompletionStream(
    params: ChatCompletionCreateParamsStreaming,
  ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
    let stream: AsyncIterable<ChatCompletionChunk>;
    try {
      stream = await this.client.chat.completions.create({
        ...params,
        stream_options: { include_usage: true },
      });
    } catch (error) {
      throw translateOpenAiError(error);
    }

    try {
      for await (const chunk of stream) {
        yield chunk;
      }
    } catch (error) {
      throw translateOpenAiError(error, { midStream: true });
    }
  }
}
