/**
 * Unified chat-completions dispatch, independent of the HTTP framework.
 *
 * DETECT -> PARSE -> ROUTE -> ENHANCE -> DISPATCH -> BLOCKING | STREAM
 */
import type { RequestFormat, SupportedProvider } from "@shared";
import {
  ModelNotFoundError,
  RequestValidationError,
  toErrorResponse,
  toStreamErrorFrame,
} from "@/errors";
import logger from "@/logging";
import {
  reportLLMRequestDuration,
  reportLLMTokens,
  reportStreamError,
  reportTimeToFirstToken,
} from "@/metrics";
import type { FileContextService } from "@/services/file-context";
import { applyFileContext } from "@/services/file-context";
import type { KnowledgeBaseEnhancer } from "@/services/knowledge-base";
import { Canonical, type ChatAdapter } from "@/types";
import type { AdapterRegistry, BedrockStreamEncoder } from "./adapters";
import { toCanonicalRequest } from "./adapters/bedrock-openai";
import { detectRequestFormat, getFormatConfidence } from "./detector";
import { isRecord } from "./utils/provider-json";
import { toSSEFrame } from "./utils/sse";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;
type ChatCompletionResponse = Canonical.Types.ChatCompletionResponse;
type ChatCompletionChunk = Canonical.Types.ChatCompletionChunk;
type Usage = Canonical.Types.Usage;

export type DispatchResult =
  | { kind: "json"; statusCode: number; body: unknown }
  | { kind: "stream"; frames: AsyncGenerator<string, void, undefined> };

export interface DispatchOptions {
  /** Response shape selector, e.g. the `target_format` query parameter */
  targetFormat?: string;
}

export interface ChatCompletionsDispatcherOptions {
  registry: AdapterRegistry;
  knowledgeBase?: Pick<KnowledgeBaseEnhancer, "enhance">;
  fileContext?: Pick<FileContextService, "buildContext">;
}

interface DispatchContext {
  provider: SupportedProvider;
  model: string;
  outputFormat: RequestFormat;
  startedAt: number;
}

/**
 * `claude` or `titan` anywhere in the value selects that shape; anything
 * else unrecognised falls back to OpenAI
 */
export function resolveOutputFormat(targetFormat: string | undefined): RequestFormat {
  if (targetFormat === undefined || targetFormat === "") {
    return "openai";
  }
  const normalized = targetFormat.toLowerCase();
  if (normalized.includes("claude")) {
    return "bedrock_claude";
  }
  if (normalized.includes("titan")) {
    return "bedrock_titan";
  }
  if (!normalized.includes("openai")) {
    logger.warn(
      { targetFormat },
      "[ChatCompletionsDispatcher] unknown target_format, responding in OpenAI shape",
    );
  }
  return "openai";
}

function readModelId(body: Record<string, unknown>): string {
  for (const field of ["model", "model_id"]) {
    const value = body[field];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
  }
  throw new ModelNotFoundError(
    "No model specified: set `model` (or `model_id` for Bedrock-shaped bodies)",
  );
}

function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000;
}

export class ChatCompletionsDispatcher {
  private readonly registry: AdapterRegistry;
  private readonly knowledgeBase: ChatCompletionsDispatcherOptions["knowledgeBase"];
  private readonly fileContext: ChatCompletionsDispatcherOptions["fileContext"];

  constructor(options: ChatCompletionsDispatcherOptions) {
    this.registry = options.registry;
    this.knowledgeBase = options.knowledgeBase;
    this.fileContext = options.fileContext;
  }

  async handle(
    rawBody: unknown,
    options: DispatchOptions = {},
  ): Promise<DispatchResult> {
    const startedAt = performance.now();
    const outputFormat = resolveOutputFormat(options.targetFormat);
    let context: DispatchContext | undefined;

    try {
      if (!isRecord(rawBody)) {
        throw new RequestValidationError("Request body must be a JSON object");
      }

      // DETECT
      const inputFormat = detectRequestFormat(rawBody);
      logger.debug(
        { inputFormat, confidence: getFormatConfidence(rawBody) },
        "[ChatCompletionsDispatcher] detected request format",
      );

      // PARSE
      const modelId = readModelId(rawBody);
      let request = this.parseRequest(rawBody, inputFormat, modelId);

      // ROUTE
      const adapter = this.registry.getAdapter(modelId);
      if (request.model !== adapter.modelId) {
        logger.info(
          { requested: request.model, routed: adapter.modelId },
          "[ChatCompletionsDispatcher] request model overridden by routing",
        );
        request = { ...request, model: adapter.modelId };
      }
      context = {
        provider: adapter.provider,
        model: adapter.modelId,
        outputFormat,
        startedAt,
      };
      logger.info(
        {
          inputFormat,
          outputFormat,
          provider: adapter.provider,
          model: adapter.modelId,
          stream: request.stream === true,
        },
        "[ChatCompletionsDispatcher] dispatching chat completion",
      );

      // ENHANCE
      const enhanced = await this.enhance(request, rawBody);
      if (enhanced.kind === "response") {
        return this.respond(enhanced.response, context);
      }
      request = enhanced.request;

      // DISPATCH
      if (request.stream === true) {
        return await this.startStream(adapter, request, context);
      }
      const response = await adapter.chatCompletion(request);
      reportLLMRequestDuration(
        { provider: context.provider, model: context.model, status: 200, stream: false },
        elapsedSeconds(startedAt),
      );
      if (response.usage) {
        reportLLMTokens(context, response.usage);
      }
      return this.respond(response, context);
    } catch (error) {
      const { statusCode, body } = toErrorResponse(error);
      const log = { err: error, statusCode, model: context?.model };
      if (statusCode >= 500) {
        logger.error(log, "[ChatCompletionsDispatcher] chat completion failed");
      } else {
        logger.warn(log, "[ChatCompletionsDispatcher] chat completion rejected");
      }
      if (context) {
        reportLLMRequestDuration(
          {
            provider: context.provider,
            model: context.model,
            status: statusCode,
            stream: false,
          },
          elapsedSeconds(startedAt),
        );
      }
      return { kind: "json", statusCode, body };
    }
  }

  private parseRequest(
    raw: Record<string, unknown>,
    format: RequestFormat,
    modelId: string,
  ): ChatCompletionRequest {
    if (format !== "openai") {
      return toCanonicalRequest(raw, format, modelId);
    }
    const parsed = Canonical.API.ChatCompletionRequestSchema.safeParse(raw);
    if (!parsed.success) {
      throw RequestValidationError.fromZodError("Invalid chat completion request", parsed.error);
    }
    return parsed.data;
  }

  /**
   * Enhancement never fails the request: each collaborator's error is logged
   * and the request continues as it was
   */
  private async enhance(
    request: ChatCompletionRequest,
    raw: Record<string, unknown>,
  ): Promise<
    | { kind: "request"; request: ChatCompletionRequest }
    | { kind: "response"; response: ChatCompletionResponse }
  > {
    let current = request;

    if (this.knowledgeBase) {
      try {
        const result = await this.knowledgeBase.enhance(current, raw);
        if (result.kind === "response") {
          return result;
        }
        current = result.request;
      } catch (error) {
        logger.error(
          { err: error },
          "[ChatCompletionsDispatcher] knowledge base enhancement failed, continuing without it",
        );
      }
    }

    const fileIds = current.file_ids ?? [];
    if (this.fileContext && fileIds.length > 0) {
      try {
        const text = await this.fileContext.buildContext(fileIds);
        current = applyFileContext(current, text);
        logger.debug(
          { files: fileIds.length, characters: text.length },
          "[ChatCompletionsDispatcher] added file context",
        );
      } catch (error) {
        logger.error(
          { err: error },
          "[ChatCompletionsDispatcher] file context failed, continuing without it",
        );
      }
    }

    return { kind: "request", request: current };
  }

  private respond(
    response: ChatCompletionResponse,
    context: DispatchContext,
  ): DispatchResult {
    if (context.outputFormat === "openai") {
      return { kind: "json", statusCode: 200, body: response };
    }
    const reverse = this.registry.getReverseAdapter(context.model);
    return {
      kind: "json",
      statusCode: 200,
      body: reverse.fromCanonicalResponse(response, context.outputFormat),
    };
  }

  /**
   * Pulls the first chunk before committing to a stream, so failures during
   * payload preparation or the provider call still get an HTTP status
   */
  private async startStream(
    adapter: ChatAdapter,
    request: ChatCompletionRequest,
    context: DispatchContext,
  ): Promise<DispatchResult> {
    const stream = adapter.streamChatCompletion(request);
    const first = await stream.next();
    return { kind: "stream", frames: this.streamFrames(stream, first, context) };
  }

  private async *streamFrames(
    stream: AsyncGenerator<ChatCompletionChunk, void, undefined>,
    first: IteratorResult<ChatCompletionChunk, void>,
    context: DispatchContext,
  ): AsyncGenerator<string, void, undefined> {
    let encode = this.createEncoder(context.model, context.outputFormat);
    let usage: Usage | undefined;
    let status = 200;

    if (!first.done) {
      reportTimeToFirstToken(context, elapsedSeconds(context.startedAt));
      const resolvedModel = first.value.model;
      if (encode !== undefined && resolvedModel && resolvedModel !== context.model) {
        encode = this.correctEncoder(resolvedModel, context) ?? encode;
      }
    }

    try {
      let result = first;
      while (!result.done) {
        const chunk = result.value;
        usage = chunk.usage ?? usage;
        if (encode === undefined) {
          yield toSSEFrame(chunk);
        } else {
          for (const event of encode(chunk)) {
            yield toSSEFrame(event);
          }
        }
        result = await stream.next();
      }
    } catch (error) {
      const { statusCode, body } = toErrorResponse(error);
      status = statusCode;
      logger.error(
        { err: error, model: context.model },
        "[ChatCompletionsDispatcher] stream failed after it started",
      );
      reportStreamError(context.provider, body.error.type);
      yield toStreamErrorFrame(error);
    } finally {
      await stream.return(undefined);
      const seconds = elapsedSeconds(context.startedAt);
      logger.info(
        { model: context.model, status, seconds, usage },
        "[ChatCompletionsDispatcher] stream finished",
      );
      reportLLMRequestDuration(
        { provider: context.provider, model: context.model, status, stream: true },
        seconds,
      );
      if (usage) {
        reportLLMTokens(context, usage);
      }
    }
  }

  private createEncoder(
    model: string,
    format: RequestFormat,
  ): BedrockStreamEncoder | undefined {
    if (format === "openai") {
      return undefined;
    }
    return this.registry.getReverseAdapter(model).createStreamEncoder(format);
  }

  /**
   * The first chunk can name a more specific model than the one routed on;
   * re-select the reverse adapter for it
   */
  private correctEncoder(
    resolvedModel: string,
    context: DispatchContext,
  ): BedrockStreamEncoder | undefined {
    logger.debug(
      { routed: context.model, resolved: resolvedModel },
      "[ChatCompletionsDispatcher] re-selected reverse adapter mid-stream",
    );
    return this.createEncoder(resolvedModel, context.outputFormat);
  }
}
