import { LLMIntegrationError, UnsupportedFeatureError } from "@/errors";
import {
  describe,
  expect,
  makeProviderDefaults,
  TEST_STREAM_CONTEXT,
  test,
} from "@/test";
import { TitanStrategy } from "./titan";

const MODEL_ID = "amazon.titan-text-express-v1";

describe("TitanStrategy", () => {
  describe("prepareRequestPayload", () => {
    test("renders a User/Bot prompt with the assistant cue", ({
      makeChatRequest,
      makeProviderDefaults,
    }) => {
      const strategy = new TitanStrategy(MODEL_ID, makeProviderDefaults());
      const payload = strategy.prepareRequestPayload(
        makeChatRequest({
          model: MODEL_ID,
          messages: [{ role: "user", content: "Capital of France?" }],
        }),
      );

      expect(payload).toEqual({
        inputText: "User: Capital of France?\nBot:",
        textGenerationConfig: { maxTokenCount: 500, temperature: 0.7 },
      });
    });

    test("merges system messages in order and maps sampling params", ({
      makeChatRequest,
      makeProviderDefaults,
    }) => {
      const strategy = new TitanStrategy(MODEL_ID, makeProviderDefaults());
      const payload = strategy.prepareRequestPayload(
        makeChatRequest({
          messages: [
            { role: "system", content: "Be brief." },
            { role: "user", content: "Hi" },
            { role: "system", content: "Answer in French." },
          ],
          max_tokens: 64,
          temperature: 0.2,
          top_p: 0.9,
          stop: "END",
        }),
      );

      expect(payload).toEqual({
        inputText: "System: Be brief.\nAnswer in French.\nUser: Hi\nBot:",
        textGenerationConfig: {
          maxTokenCount: 64,
          temperature: 0.2,
          topP: 0.9,
          stopSequences: ["END"],
        },
      });
    });

    test("labels tool turns and skips the cue after an assistant turn", ({
      makeChatRequest,
      makeProviderDefaults,
    }) => {
      const strategy = new TitanStrategy(MODEL_ID, makeProviderDefaults());
      const payload = strategy.prepareRequestPayload(
        makeChatRequest({
          messages: [
            { role: "user", content: "What is 6 x 7?" },
            { role: "tool", content: "42", tool_call_id: "call_1" },
            { role: "assistant", content: "It is 42." },
          ],
        }),
      );

      expect(payload.inputText).toBe(
        "User: What is 6 x 7?\nUser (Tool Response - unknown_tool): 42\nBot: It is 42.",
      );
    });

    test("rejects tools before building a payload", ({
      makeChatRequest,
      makeProviderDefaults,
    }) => {
      const strategy = new TitanStrategy(MODEL_ID, makeProviderDefaults());
      expect(() =>
        strategy.prepareRequestPayload(
          makeChatRequest({
            tools: [
              {
                type: "function",
                function: { name: "lookup", description: "Look up", parameters: {} },
              },
            ],
          }),
        ),
      ).toThrow(UnsupportedFeatureError);
      expect(() =>
        strategy.prepareRequestPayload(makeChatRequest({ tool_choice: "auto" })),
      ).toThrow(UnsupportedFeatureError);
    });
  });

  describe("parseResponse", () => {
    test("maps the first result and usage", ({
      makeChatRequest,
      makeProviderDefaults,
    }) => {
      const strategy = new TitanStrategy(MODEL_ID, makeProviderDefaults());
      const response = strategy.parseResponse(
        {
          inputTextTokenCount: 7,
          results: [
            { tokenCount: 1, outputText: "Paris", completionReason: "FINISH" },
          ],
        },
        makeChatRequest(),
      );

      expect(response.id).toMatch(/^bedrock-titan-/);
      expect(response.model).toBe(MODEL_ID);
      expect(response.choices).toEqual([
        {
          index: 0,
          message: { role: "assistant", content: "Paris" },
          finish_reason: "stop",
        },
      ]);
      expect(response.usage).toEqual({
        prompt_tokens: 7,
        completion_tokens: 1,
        total_tokens: 8,
      });
    });

    test.each([
      ["LENGTH", "length"],
      ["CONTENT_FILTERED", "content_filter"],
      ["SOMETHING_NEW", "SOMETHING_NEW"],
    ])("maps completionReason %s to %s", (reason, expected) => {
      const strategy = new TitanStrategy(MODEL_ID, makeProviderDefaults());
      const response = strategy.parseResponse(
        {
          inputTextTokenCount: 1,
          results: [{ tokenCount: 1, outputText: "x", completionReason: reason }],
        },
        { model: MODEL_ID, messages: [{ role: "user", content: "x" }] },
      );
      expect(response.choices[0].finish_reason).toBe(expected);
    });

    test("fails on an empty result list", ({
      makeChatRequest,
      makeProviderDefaults,
    }) => {
      const strategy = new TitanStrategy(MODEL_ID, makeProviderDefaults());
      expect(() =>
        strategy.parseResponse(
          { inputTextTokenCount: 3, results: [] },
          makeChatRequest(),
        ),
      ).toThrow(LLMIntegrationError);
    });
  });

  describe("handleStreamChunk", () => {
    test("emits content, finish and metadata chunks", ({
      makeChatRequest,
      makeProviderDefaults,
    }) => {
      const strategy = new TitanStrategy(MODEL_ID, makeProviderDefaults());
      const request = makeChatRequest();

      const content = strategy.handleStreamChunk(
        { outputText: "Hel", index: 0 },
        request,
        TEST_STREAM_CONTEXT,
      );
      expect(content).toEqual({
        id: "br-test-stream",
        object: "chat.completion.chunk",
        created: 1700000000,
        model: MODEL_ID,
        choices: [
          {
            index: 0,
            delta: { role: "assistant", content: "Hel" },
            finish_reason: null,
          },
        ],
      });

      const finish = strategy.handleStreamChunk(
        { outputText: "", index: 0, completionReason: "FINISH" },
        request,
        TEST_STREAM_CONTEXT,
      );
      expect(finish.choices).toEqual([
        { index: 0, delta: {}, finish_reason: "stop" },
      ]);

      const metadata = strategy.handleStreamChunk(
        { outputText: "", index: 0, completionReason: null },
        request,
        TEST_STREAM_CONTEXT,
      );
      expect(metadata.choices).toEqual([]);
    });
  });
});

