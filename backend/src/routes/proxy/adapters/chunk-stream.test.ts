import { collect, describe, expect, test } from "@/test";
import type { Canonical } from "@/types";
import {
  finalizeChunkStream,
  hasChunkPayload,
  isFinishChunk,
  makeFinishChunk,
} from "./chunk-stream";

type ChatCompletionChunk = Canonical.Types.ChatCompletionChunk;

const TEMPLATE = { id: "chunk-1", created: 1700000000, model: "test-model" };

function chunk(
  delta: Canonical.Types.ChunkDelta,
  finishReason: string | null = null,
  usage?: Canonical.Types.Usage,
): ChatCompletionChunk {
  return {
    ...TEMPLATE,
    object: "chat.completion.chunk",
    choices: [{ index: 0, delta, finish_reason: finishReason }],
    ...(usage ? { usage } : {}),
  };
}

function usageOnly(usage: Canonical.Types.Usage): ChatCompletionChunk {
  return { ...TEMPLATE, object: "chat.completion.chunk", choices: [], usage };
}

async function* from(chunks: ChatCompletionChunk[]) {
  yield* chunks;
}

const USAGE = { prompt_tokens: 4, completion_tokens: 2, total_tokens: 6 };

describe("hasChunkPayload", () => {
  test("is false for role-only and empty-content deltas", () => {
    expect(hasChunkPayload(chunk({ role: "assistant" }))).toBe(false);
    expect(hasChunkPayload(chunk({ role: "assistant", content: "" }))).toBe(false);
    expect(hasChunkPayload(usageOnly(USAGE))).toBe(false);
  });

  test("is true for content, tool calls or a finish reason", () => {
    expect(hasChunkPayload(chunk({ content: "x" }))).toBe(true);
    expect(
      hasChunkPayload(chunk({ tool_calls: [{ index: 0, function: { arguments: "{" } }] })),
    ).toBe(true);
    expect(hasChunkPayload(chunk({}, "length"))).toBe(true);
  });
});

describe("isFinishChunk", () => {
  test("detects a non-null finish reason", () => {
    expect(isFinishChunk(chunk({}, "stop"))).toBe(true);
    expect(isFinishChunk(chunk({ content: "x" }))).toBe(false);
  });
});

describe("finalizeChunkStream", () => {
  test("drops empty chunks and keeps order", async () => {
    const result = await collect(
      finalizeChunkStream(
        from([
          chunk({ role: "assistant" }),
          chunk({ content: "a" }),
          chunk({ content: "" }),
          chunk({ content: "b" }),
          chunk({}, "stop"),
        ]),
        () => makeFinishChunk(TEMPLATE),
      ),
    );

    expect(result.map((item) => item.choices[0]?.delta.content)).toEqual([
      "a",
      "b",
      undefined,
    ]);
    expect(result[2]?.choices[0]?.finish_reason).toBe("stop");
  });

  test("folds a trailing usage chunk into the finish chunk", async () => {
    const result = await collect(
      finalizeChunkStream(
        from([chunk({ content: "a" }), chunk({}, "length"), usageOnly(USAGE)]),
        () => makeFinishChunk(TEMPLATE),
      ),
    );

    expect(result).toHaveLength(2);
    expect(result[1]?.choices[0]?.finish_reason).toBe("length");
    expect(result[1]?.usage).toEqual(USAGE);
  });

  test("ignores anything after the first finish chunk", async () => {
    const result = await collect(
      finalizeChunkStream(
        from([chunk({}, "stop"), chunk({ content: "late" }), chunk({}, "length")]),
        () => makeFinishChunk(TEMPLATE),
      ),
    );

    expect(result).toHaveLength(1);
    expect(result[0]?.choices[0]?.finish_reason).toBe("stop");
  });

  test("emits the closing chunk when the source never finishes", async () => {
    const result = await collect(
      finalizeChunkStream(from([chunk({ content: "a" })]), () =>
        makeFinishChunk(TEMPLATE),
      ),
    );

    expect(result[1]).toEqual({
      id: "chunk-1",
      object: "chat.completion.chunk",
      created: 1700000000,
      model: "test-model",
      choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
    });
  });
});
