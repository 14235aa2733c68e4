import { describe, expect, test } from "@/test";
import { LLAMA_PROMPT_TEMPLATE } from "./meta";
import { MISTRAL_PROMPT_TEMPLATE } from "./mistral";
import {
  renderInstructionPrompt,
  renderRolePrefixedPrompt,
} from "./prompt-templates";
import { ASSISTANT_PROMPT_TEMPLATE } from "./stability";

describe("renderRolePrefixedPrompt", () => {
  test("joins turns and appends the cue after a user turn", () => {
    expect(
      renderRolePrefixedPrompt(ASSISTANT_PROMPT_TEMPLATE, "S", [
        { role: "user", content: "U" },
      ]),
    ).toBe("System: S\n\nUser: U\n\nAssistant:");
  });

  test("omits the cue when the assistant spoke last", () => {
    expect(
      renderRolePrefixedPrompt(ASSISTANT_PROMPT_TEMPLATE, null, [
        { role: "user", content: "U" },
        { role: "assistant", content: "A" },
      ]),
    ).toBe("User: U\n\nAssistant: A");
  });

  test("flattens block content to its text parts", () => {
    expect(
      renderRolePrefixedPrompt(ASSISTANT_PROMPT_TEMPLATE, null, [
        {
          role: "user",
          content: [
            { type: "text", text: "Look" },
            { type: "image_url", image_url: { url: "https://example.com/a.png" } },
            { type: "text", text: "here" },
          ],
        },
      ]),
    ).toBe("User: Look here\n\nAssistant:");
  });
});

describe("renderInstructionPrompt", () => {
  test("wraps a Llama conversation with a system block", () => {
    expect(
      renderInstructionPrompt(LLAMA_PROMPT_TEMPLATE, "Be kind", [
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello!" },
        { role: "user", content: "How are you?" },
      ]),
    ).toBe(
      "<s>[INST] <<SYS>>\nBe kind\n<</SYS>>\n\nHi [/INST] Hello! </s><s>[INST] How are you? [/INST]",
    );
  });

  test("opens a new instruction for tool responses", () => {
    expect(
      renderInstructionPrompt(LLAMA_PROMPT_TEMPLATE, null, [
        { role: "user", content: "Q" },
        { role: "assistant", content: "calling" },
        { role: "tool", content: "42", tool_call_id: "call_1" },
      ]),
    ).toBe("<s>[INST] Q [/INST] calling </s><s>[INST] Tool Response: 42 [/INST]");
  });

  test("uses the Mistral system and assistant framing", () => {
    expect(
      renderInstructionPrompt(MISTRAL_PROMPT_TEMPLATE, "Be kind", [
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello!" },
      ]),
    ).toBe("<s>[INST] Be kind\n\nHi [/INST] Hello!</s>");
  });

  test("closes an instruction left open", () => {
    expect(renderInstructionPrompt(LLAMA_PROMPT_TEMPLATE, "Only system", [])).toBe(
      "<s>[INST] <<SYS>>\nOnly system\n<</SYS>>\n\n [/INST]",
    );
  });
});
