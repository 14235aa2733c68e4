import { buildApp } from "@/app";
import { AdapterRegistry } from "@/routes/proxy/adapters";
import {
  ChatCompletionsDispatcher,
  type DispatchResult,
} from "@/routes/proxy/dispatcher";
import {
  afterEach,
  describe,
  expect,
  FakeOpenAiChatClient,
  FakeProviderInvoker,
  makeProviderDefaults,
  test,
  vi,
} from "@/test";

async function* framesFrom(
  frames: string[],
  onClose: () => void = () => {},
): AsyncGenerator<string, void, undefined> {
  try {
    yield* frames;
  } finally {
    onClose();
  }
}

function stubDispatcher(result: DispatchResult) {
  return { handle: vi.fn(async () => result) };
}

let app: Awaited<ReturnType<typeof buildApp>> | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe("POST /v1/chat/completions", () => {
  test("sends JSON results with their status and forwards target_format", async () => {
    const dispatcher = stubDispatcher({
      kind: "json",
      statusCode: 404,
      body: { error: { message: "nope", type: "ModelNotFoundError", code: null } },
    });
    app = await buildApp({ dispatcher });

    const response = await app.inject({
      method: "POST",
      url: "/v1/chat/completions?target_format=bedrock_titan",
      payload: { model: "unknown", messages: [] },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: { message: "nope", type: "ModelNotFoundError", code: null },
    });
    expect(dispatcher.handle).toHaveBeenCalledWith(
      { model: "unknown", messages: [] },
      { targetFormat: "bedrock_titan" },
    );
  });

  test("writes stream frames as SSE and ends with [DONE]", async () => {
    let closed = false;
    const dispatcher = stubDispatcher({
      kind: "stream",
      frames: framesFrom(['data: {"n":1}\n\n', 'data: {"n":2}\n\n'], () => {
        closed = true;
      }),
    });
    app = await buildApp({ dispatcher });

    const response = await app.inject({
      method: "POST",
      url: "/v1/chat/completions",
      payload: { model: "gpt-4o-mini", stream: true },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("text/event-stream");
    expect(response.headers["cache-control"]).toBe("no-cache");
    expect(response.payload).toBe(
      'data: {"n":1}\n\ndata: {"n":2}\n\ndata: [DONE]\n\n',
    );
    expect(closed).toBe(true);
  });

  test("streams a Bedrock Titan completion end to end", async () => {
    const invoker = new FakeProviderInvoker({
      events: [
        { outputText: "Pa", index: 0 },
        {
          outputText: "ris",
          index: 0,
          completionReason: "FINISH",
        },
      ],
    });
    const registry = new AdapterRegistry({
      defaults: makeProviderDefaults(),
      createBedrockInvoker: () => invoker,
      createOpenAiClient: () => new FakeOpenAiChatClient(),
    });
    app = await buildApp({
      dispatcher: new ChatCompletionsDispatcher({ registry }),
    });

    const response = await app.inject({
      method: "POST",
      url: "/v1/chat/completions",
      payload: {
        model: "amazon.titan-text-express-v1",
        messages: [{ role: "user", content: "Capital of France?" }],
        stream: true,
      },
    });

    const frames = response.payload.split("\n\n").filter(Boolean);
    expect(response.statusCode).toBe(200);
    expect(frames.at(-1)).toBe("data: [DONE]");
    expect(invoker.calls[0]).toMatchObject({ stream: true });
    expect(invoker.streamClosed).toBe(true);
  });

  test("malformed JSON gets an error body", async () => {
    app = await buildApp({
      dispatcher: stubDispatcher({ kind: "json", statusCode: 200, body: {} }),
    });

    const response = await app.inject({
      method: "POST",
      url: "/v1/chat/completions",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      error: { type: "invalid_request_error" },
    });
  });
});

describe("GET /v1/chat/completions/health", () => {
  test("reports the supported input formats", async () => {
    app = await buildApp({
      dispatcher: stubDispatcher({ kind: "json", statusCode: 200, body: {} }),
    });

    const response = await app.inject({
      method: "GET",
      url: "/v1/chat/completions/health",
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: "healthy",
      message: "Unified chat completions endpoint operational",
      supported_input_formats: ["openai", "bedrock_claude", "bedrock_titan"],
      model_routing: "enabled",
      streaming_support: "enabled",
      routing_method: "model_id_based",
    });
  });
});

describe("GET /v1/models", () => {
  test("lists the alias catalogue", async () => {
    app = await buildApp({
      dispatcher: stubDispatcher({ kind: "json", statusCode: 200, body: {} }),
    });

    const response = await app.inject({ method: "GET", url: "/v1/models" });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.object).toBe("list");
    expect(body.data).toContainEqual({
      id: "nova-lite",
      object: "model",
      owned_by: "bedrock",
    });
  });
});

describe("GET /metrics", () => {
  test("is only served when metrics are enabled", async () => {
    const dispatcher = stubDispatcher({ kind: "json", statusCode: 200, body: {} });

    app = await buildApp({ dispatcher });
    expect((await app.inject({ method: "GET", url: "/metrics" })).statusCode).toBe(404);
    await app.close();

    app = await buildApp({ dispatcher, metricsEnabled: true });
    const response = await app.inject({ method: "GET", url: "/metrics" });
    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toContain("text/plain");
  });
});
