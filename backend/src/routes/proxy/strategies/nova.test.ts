import { LLMIntegrationError, UnsupportedFeatureError } from "@/errors";
import {
  describe,
  expect,
  makeChatRequest,
  makeProviderDefaults,
  TEST_STREAM_CONTEXT,
  test,
} from "@/test";
import { NovaStrategy } from "./nova";

const MODEL_ID = "amazon.nova-lite-v1:0";

function makeStrategy() {
  return new NovaStrategy(MODEL_ID, makeProviderDefaults());
}

describe("NovaStrategy", () => {
  test("builds a messages-v1 payload with alternating turns", () => {
    const payload = makeStrategy().prepareRequestPayload(
      makeChatRequest({
        messages: [
          { role: "system", content: "S" },
          { role: "user", content: "U1" },
          { role: "tool", content: "R", tool_call_id: "call_1" },
          { role: "user", content: "U2" },
          { role: "assistant", content: "A" },
        ],
      }),
    );

    expect(payload).toEqual({
      schemaVersion: "messages-v1",
      system: [{ text: "S" }],
      messages: [
        {
          role: "user",
          content: [{ text: "U1" }, { text: "Tool Response: R" }, { text: "U2" }],
        },
        { role: "assistant", content: [{ text: "A" }] },
      ],
      inferenceConfig: { maxTokens: 4000, temperature: 0.7 },
    });
  });

  test("maps sampling params into inferenceConfig", () => {
    const payload = makeStrategy().prepareRequestPayload(
      makeChatRequest({ top_p: 0.5, top_k: 20, stop: ["END"], max_tokens: 10 }),
    );
    expect(payload.inferenceConfig).toEqual({
      maxTokens: 10,
      temperature: 0.7,
      topP: 0.5,
      topK: 20,
      stopSequences: ["END"],
    });
  });

  test("rejects tools", () => {
    expect(() =>
      makeStrategy().prepareRequestPayload(
        makeChatRequest({ tool_choice: "required" }),
      ),
    ).toThrow(UnsupportedFeatureError);
  });

  test("parses the output message", () => {
    const response = makeStrategy().parseResponse(
      {
        output: {
          message: {
            role: "assistant",
            content: [{ text: "Hello" }, { text: " there" }],
          },
        },
        stopReason: "end_turn",
        usage: { inputTokens: 5, outputTokens: 2, totalTokens: 7 },
      },
      makeChatRequest(),
    );

    expect(response.choices[0]).toEqual({
      index: 0,
      message: { role: "assistant", content: "Hello there" },
      finish_reason: "stop",
    });
    expect(response.usage).toEqual({
      prompt_tokens: 5,
      completion_tokens: 2,
      total_tokens: 7,
    });
  });

  test.each([
    ["max_tokens", "length"],
    ["content_filtered", "content_filter"],
    ["stop_sequence", "stop"],
  ])("maps stopReason %s to %s", (stopReason, expected) => {
    const response = makeStrategy().parseResponse(
      { output: { message: { content: [] } }, stopReason },
      makeChatRequest(),
    );
    expect(response.choices[0].finish_reason).toBe(expected);
  });

  test("fails without an output message", () => {
    expect(() =>
      makeStrategy().parseResponse({ stopReason: "end_turn" }, makeChatRequest()),
    ).toThrow(LLMIntegrationError);
  });

  test.each([
    [
      "key-tagged delta",
      { contentBlockDelta: { delta: { text: "Hi" }, contentBlockIndex: 0 } },
      [{ index: 0, delta: { role: "assistant", content: "Hi" }, finish_reason: null }],
    ],
    [
      "type-tagged delta",
      { type: "contentBlockDelta", delta: { text: "Hi" } },
      [{ index: 0, delta: { role: "assistant", content: "Hi" }, finish_reason: null }],
    ],
    [
      "key-tagged stop",
      { messageStop: { stopReason: "max_tokens" } },
      [{ index: 0, delta: {}, finish_reason: "length" }],
    ],
    [
      "type-tagged stop without a reason",
      { type: "messageStop" },
      [{ index: 0, delta: {}, finish_reason: "stop" }],
    ],
    ["message start", { messageStart: { role: "assistant" } }, []],
    ["metadata", { metadata: { usage: { inputTokens: 1 } } }, []],
  ])("stream event: %s", (_label, event, expected) => {
    const chunk = makeStrategy().handleStreamChunk(
      event,
      makeChatRequest(),
      TEST_STREAM_CONTEXT,
    );
    expect(chunk.choices).toEqual(expected);
  });
});
