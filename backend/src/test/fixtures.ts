/**
 * biome-ignore-all lint/correctness/noEmptyPattern: oddly enough in extend below this is required
 * see https://vitest.dev/guide/test-context.html#extend-test-context
 */
import type { ModelDefaultsKey } from "@shared";
import type {
  ChatCompletion,
  ChatCompletionChunk as OpenAiChatCompletionChunk,
  ChatCompletionCreateParams,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
} from "openai/resources/chat/completions";
import { test as baseTest } from "vitest";
import type { OpenAiChatClient } from "@/clients/openai-client";
import type { FileStore, StoredFile } from "@/services/file-context";
import type {
  KnowledgeBaseClient,
  RetrieveAndGenerateParams,
  RetrieveAndGenerateResult,
  RetrievedPassage,
  RetrieveParams,
} from "@/services/knowledge-base";
import {
  createProviderDefaults,
  type ModelDefaults,
  type ProviderDefaults,
} from "@/config";
import type {
  Canonical,
  ProviderInvoker,
  ProviderPayload,
  StreamContext,
} from "@/types";

type ChatCompletionRequest = Canonical.Types.ChatCompletionRequest;

/**
 * Distinct max_tokens per provider so tests can tell which default applied
 */
export const TEST_MODEL_DEFAULTS: Record<ModelDefaultsKey, ModelDefaults> = {
  openai: { maxTokens: 1000, temperature: 0.7 },
  claude: { maxTokens: 2000, temperature: 0.7 },
  titan: { maxTokens: 500, temperature: 0.7 },
  nova: { maxTokens: 4000, temperature: 0.7 },
  ai21: { maxTokens: 2100, temperature: 0.7 },
  cohere: { maxTokens: 2200, temperature: 0.7 },
  meta: { maxTokens: 2300, temperature: 0.7 },
  mistral: { maxTokens: 2400, temperature: 0.7 },
  stability: { maxTokens: 2500, temperature: 0.7 },
  writer: { maxTokens: 2600, temperature: 0.7 },
};

export const TEST_STREAM_CONTEXT: StreamContext = {
  streamId: "br-test-stream",
  created: 1700000000,
};

/**
 * Canonical request with a single user turn unless overridden
 */
function makeChatRequest(
  overrides: Partial<ChatCompletionRequest> = {},
): ChatCompletionRequest {
  return {
    model: "gpt-4o-mini",
    messages: [{ role: "user", content: "Hello" }],
    ...overrides,
  };
}

function makeProviderDefaults(
  overrides: Partial<Record<ModelDefaultsKey, ModelDefaults>> = {},
): ProviderDefaults {
  return createProviderDefaults({ ...TEST_MODEL_DEFAULTS, ...overrides });
}

interface InvokerCall {
  modelId: string;
  body: ProviderPayload;
  stream: boolean;
}

/**
 * In-process stand-in for the Bedrock runtime: returns a canned body, or
 * replays canned stream events, optionally failing part-way.
 */
export class FakeProviderInvoker implements ProviderInvoker {
  readonly calls: InvokerCall[] = [];
  streamClosed = false;
  private response: unknown;
  private events: unknown[];
  private failure: { error: unknown; afterEvents: number } | undefined;

  constructor(
    options: {
      response?: unknown;
      events?: unknown[];
      failure?: { error: unknown; afterEvents: number };
    } = {},
  ) {
    this.response = options.response ?? {};
    this.events = options.events ?? [];
    this.failure = options.failure;
  }

  async invoke(modelId: string, body: ProviderPayload): Promise<unknown> {
    this.calls.push({ modelId, body, stream: false });
    if (this.failure) {
      throw this.failure.error;
    }
    return this.response;
  }

  async *invokeStream(
    modelId: string,
    body: ProviderPayload,
  ): AsyncGenerator<unknown, void, undefined> {
    this.calls.push({ modelId, body, stream: true });
    try {
      for (const [index, event] of this.events.entries()) {
        if (this.failure && index === this.failure.afterEvents) {
          throw this.failure.error;
        }
        yield event;
      }
      if (this.failure && this.failure.afterEvents >= this.events.length) {
        throw this.failure.error;
      }
    } finally {
      this.streamClosed = true;
    }
  }
}

function makeFakeInvoker(
  options: ConstructorParameters<typeof FakeProviderInvoker>[0] = {},
) {
  return new FakeProviderInvoker(options);
}

/**
 * In-process stand-in for the OpenAI SDK seam
 */
export class FakeOpenAiChatClient implements OpenAiChatClient {
  readonly calls: ChatCompletionCreateParams[] = [];
  streamClosed = false;
  private completion: ChatCompletion | undefined;
  private chunks: OpenAiChatCompletionChunk[];
  private failure: unknown;

  constructor(
    options: {
      completion?: ChatCompletion;
      chunks?: OpenAiChatCompletionChunk[];
      failure?: unknown;
    } = {},
  ) {
    this.completion = options.completion;
    this.chunks = options.chunks ?? [];
    this.failure = options.failure;
  }

  async createCompletion(
    params: ChatCompletionCreateParamsNonStreaming,
  ): Promise<ChatCompletion> {
    this.calls.push(params);
    if (this.failure !== undefined) {
      throw this.failure;
    }
    return this.completion ?? makeOpenAiCompletion();
  }

  async *createCompletionStream(
    params: ChatCompletionCreateParamsStreaming,
  ): AsyncGenerator<OpenAiChatCompletionChunk, void, undefined> {
    this.calls.push(params);
    try {
      if (this.failure !== undefined) {
        throw this.failure;
      }
      yield* this.chunks;
    } finally {
      this.streamClosed = true;
    }
  }
}

export function makeOpenAiCompletion(
  options: {
    content?: string | null;
    toolCalls?: { id: string; name: string; arguments: string }[];
    finishReason?: ChatCompletion.Choice["finish_reason"];
    usage?: { prompt_tokens: number; completion_tokens: number };
  } = {},
): ChatCompletion {
  const usage = options.usage ?? { prompt_tokens: 5, completion_tokens: 7 };
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 1700000000,
    model: "gpt-4o-mini",
    choices: [
      {
        index: 0,
        logprobs: null,
        finish_reason: options.finishReason ?? "stop",
        message: {
          role: "assistant",
          content: options.content === undefined ? "Hi there" : options.content,
          refusal: null,
          ...(options.toolCalls
            ? {
                tool_calls: options.toolCalls.map((call) => ({
                  id: call.id,
                  type: "function" as const,
                  function: { name: call.name, arguments: call.arguments },
                })),
              }
            : {}),
        },
      },
    ],
    usage: {
      ...usage,
      total_tokens: usage.prompt_tokens + usage.completion_tokens,
    },
  };
}

export function makeOpenAiChunk(
  choices: OpenAiChatCompletionChunk["choices"],
  usage?: { prompt_tokens: number; completion_tokens: number },
): OpenAiChatCompletionChunk {
  return {
    id: "chatcmpl-stream",
    object: "chat.completion.chunk",
    created: 1700000000,
    model: "gpt-4o-mini",
    choices,
    ...(usage
      ? {
          usage: {
            ...usage,
            total_tokens: usage.prompt_tokens + usage.completion_tokens,
          },
        }
      : {}),
  };
}

/**
 * In-process stand-in for Bedrock Agent Runtime
 */
export class FakeKnowledgeBaseClient implements KnowledgeBaseClient {
  readonly retrieveCalls: RetrieveParams[] = [];
  readonly generateCalls: RetrieveAndGenerateParams[] = [];
  private passages: RetrievedPassage[];
  private generated: RetrieveAndGenerateResult;
  private failure: { retrieve?: unknown; generate?: unknown };

  constructor(
    options: {
      passages?: RetrievedPassage[];
      generated?: RetrieveAndGenerateResult;
      failure?: { retrieve?: unknown; generate?: unknown };
    } = {},
  ) {
    this.passages = options.passages ?? [];
    this.generated = options.generated ?? {
      output: "Generated answer",
      citations: [],
      sessionId: null,
    };
    this.failure = options.failure ?? {};
  }

  async retrieve(params: RetrieveParams): Promise<RetrievedPassage[]> {
    this.retrieveCalls.push(params);
    if (this.failure.retrieve !== undefined) {
      throw this.failure.retrieve;
    }
    return this.passages;
  }

  async retrieveAndGenerate(
    params: RetrieveAndGenerateParams,
  ): Promise<RetrieveAndGenerateResult> {
    this.generateCalls.push(params);
    if (this.failure.generate !== undefined) {
      throw this.failure.generate;
    }
    return this.generated;
  }
}

/**
 * File store backed by a plain map of id -> file
 */
export class InMemoryFileStore implements FileStore {
  private readonly files = new Map<string, StoredFile & { content: Uint8Array }>();

  constructor(
    files: Array<StoredFile & { content: string | Uint8Array }> = [],
  ) {
    for (const file of files) {
      this.files.set(file.fileId, {
        ...file,
        content:
          typeof file.content === "string"
            ? new TextEncoder().encode(file.content)
            : file.content,
      });
    }
  }

  async getMetadata(fileId: string): Promise<StoredFile | undefined> {
    const file = this.files.get(fileId);
    return file
      ? { fileId, filename: file.filename, contentType: file.contentType }
      : undefined;
  }

  async getContent(fileId: string): Promise<Uint8Array | undefined> {
    return this.files.get(fileId)?.content;
  }
}

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Vitest test extension with fixtures
 * https://vitest.dev/guide/test-context.html#extend-test-context
 */
interface TestFixtures {
  makeChatRequest: typeof makeChatRequest;
  makeProviderDefaults: typeof makeProviderDefaults;
  makeFakeInvoker: typeof makeFakeInvoker;
}

export const test = baseTest.extend<TestFixtures>({
  makeChatRequest: async ({}, use) => {
    await use(makeChatRequest);
  },
  makeProviderDefaults: async ({}, use) => {
    await use(makeProviderDefaults);
  },
  makeFakeInvoker: async ({}, use) => {
    await use(makeFakeInvoker);
  },
});

export { makeChatRequest, makeFakeInvoker, makeProviderDefaults };
