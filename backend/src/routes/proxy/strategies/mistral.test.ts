import { LLMIntegrationError } from "@/errors";
import {
  describe,
  expect,
  makeChatRequest,
  makeProviderDefaults,
  TEST_STREAM_CONTEXT,
  test,
} from "@/test";
import { MistralStrategy } from "./mistral";

const MODEL_ID = "mistral.mistral-7b-instruct-v0:2";

function makeStrategy() {
  return new MistralStrategy(MODEL_ID, makeProviderDefaults());
}

describe("MistralStrategy", () => {
  test("builds the payload with top_k and stop", () => {
    const payload = makeStrategy().prepareRequestPayload(
      makeChatRequest({
        messages: [
          { role: "system", content: "Be kind" },
          { role: "user", content: "Hi" },
        ],
        top_k: 50,
        stop: ["\n\n"],
      }),
    );
    expect(payload).toEqual({
      prompt: "<s>[INST] Be kind\n\nHi [/INST]",
      max_tokens: 2400,
      temperature: 0.7,
      top_k: 50,
      stop: ["\n\n"],
    });
  });

  test("parses the first output", () => {
    const response = makeStrategy().parseResponse(
      { outputs: [{ text: "Bonjour", stop_reason: "model_length" }] },
      makeChatRequest(),
    );
    expect(response.choices[0].message.content).toBe("Bonjour");
    expect(response.choices[0].finish_reason).toBe("length");
    expect(response.usage).toEqual({
      prompt_tokens: 0,
      completion_tokens: 0,
      total_tokens: 0,
    });
  });

  test("fails on empty outputs", () => {
    expect(() =>
      makeStrategy().parseResponse({ outputs: [] }, makeChatRequest()),
    ).toThrow(LLMIntegrationError);
  });

  test("reads stream text from the first output", () => {
    const chunk = makeStrategy().handleStreamChunk(
      { outputs: [{ text: "Bon", stop_reason: null }] },
      makeChatRequest(),
      TEST_STREAM_CONTEXT,
    );
    expect(chunk.choices).toEqual([
      { index: 0, delta: { role: "assistant", content: "Bon" }, finish_reason: null },
    ]);
  });

  test.each([
    ["stop", "stop"],
    ["length", "length"],
    ["model_length", "length"],
    ["SOMETHING_NEW", "SOMETHING_NEW"],
  ])("maps stop_reason %s to %s", (reason, expected) => {
    const response = makeStrategy().parseResponse(
      { outputs: [{ text: "", stop_reason: reason }] },
      makeChatRequest(),
    );
    expect(response.choices[0].finish_reason).toBe(expected);
  });

  test("round-trips a request through a canned response", () => {
    const strategy = makeStrategy();
    const request = makeChatRequest({
      messages: [{ role: "user", content: "Capital of France?" }],
      max_tokens: 20,
      temperature: 0.2,
    });

    expect(strategy.prepareRequestPayload(request)).toEqual({
      prompt: "<s>[INST] Capital of France? [/INST]",
      max_tokens: 20,
      temperature: 0.2,
    });

    const response = strategy.parseResponse(
      {
        outputs: [{ text: "Paris", stop_reason: "stop" }],
        usage: { prompt_tokens: 8, completion_tokens: 1 },
      },
      request,
    );
    expect(response).toMatchObject({
      object: "chat.completion",
      model: MODEL_ID,
      choices: [
        { index: 0, message: { role: "assistant", content: "Paris" }, finish_reason: "stop" },
      ],
      usage: { prompt_tokens: 8, completion_tokens: 1, total_tokens: 9 },
    });
  });
});
