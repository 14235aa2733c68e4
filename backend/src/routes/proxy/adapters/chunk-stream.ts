/**
 * Relay rules shared by every adapter stream: drop chunks that carry
 * nothing, and make sure exactly one finish chunk is emitted, last.
 */
import type { Canonical } from "@/types";

type ChatCompletionChunk = Canonical.Types.ChatCompletionChunk;

export function hasChunkPayload(chunk: ChatCompletionChunk): boolean {
  return chunk.choices.some(
    (choice) =>
      choice.finish_reason !== null ||
      (typeof choice.delta.content === "string" &&
        choice.delta.content.length > 0) ||
      (choice.delta.tool_calls?.length ?? 0) > 0,
  );
}

export function isFinishChunk(chunk: ChatCompletionChunk): boolean {
  return chunk.choices.some((choice) => choice.finish_reason !== null);
}

export function makeFinishChunk(
  template: Pick<ChatCompletionChunk, "id" | "created" | "model">,
): ChatCompletionChunk {
  return {
    ...template,
    object: "chat.completion.chunk",
    choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
  };
}

/**
 * Filter a canonical chunk stream down to payload-bearing chunks.
 *
 * The first finish chunk is held back until the source ends so that a
 * trailing usage-only chunk can be folded into it; anything else after it is
 * dropped. A source that ends without a finish chunk gets one from `closing`.
 */
export async function* finalizeChunkStream(
  source: AsyncIterable<ChatCompletionChunk>,
  closing: () => ChatCompletionChunk,
): AsyncGenerator<ChatCompletionChunk, void, undefined> {
  let finish: ChatCompletionChunk | undefined;

  for await (const chunk of source) {
    if (finish !== undefined) {
      if (chunk.usage) {
        finish = { ...finish, usage: chunk.usage };
      }
      continue;
    }
    if (!hasChunkPayload(chunk)) {
      continue;
    }
    if (isFinishChunk(chunk)) {
      finish = chunk;
      continue;
    }
    yield chunk;
  }

  yield finish ?? closing();
}
