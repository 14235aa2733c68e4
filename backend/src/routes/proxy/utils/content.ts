/**
 * Conversions for the canonical `Content` union (plain text | ordered blocks).
 * Every provider boundary goes through these instead of inspecting content ad hoc.
 */
import type { Canonical } from "@/types";

type Content = Canonical.Types.Content;
type ContentBlock = Canonical.Types.ContentBlock;

const DATA_URL_PATTERN = /^data:([^;,]+);base64,(.*)$/s;

/**
 * Flatten content to text. Block lists keep only their text blocks.
 */
export function contentToText(
  content: Content | null | undefined,
  separator = " ",
): string {
  if (content === null || content === undefined) {
    return "";
  }
  if (typeof content === "string") {
    return content;
  }
  return content
    .filter((block) => block.type === "text")
    .map((block) => (block.type === "text" ? block.text : ""))
    .join(separator);
}

/**
 * View content as an ordered block list. Plain text becomes one text block;
 * an empty string becomes no blocks.
 */
export function contentToBlocks(
  content: Content | null | undefined,
): ContentBlock[] {
  if (content === null || content === undefined) {
    return [];
  }
  if (typeof content === "string") {
    return content.length > 0 ? [{ type: "text", text: content }] : [];
  }
  return content;
}

export function parseDataUrl(
  url: string,
): { mediaType: string; data: string } | null {
  const match = DATA_URL_PATTERN.exec(url);
  if (!match) {
    return null;
  }
  return { mediaType: match[1], data: match[2] };
}

export function toDataUrl(mediaType: string, data: string): string {
  return `data:${mediaType};base64,${data}`;
}

/**
 * Normalise the OpenAI `stop` field to a list
 */
export function toStopSequences(
  stop: string | string[] | undefined,
): string[] | undefined {
  if (stop === undefined) {
    return undefined;
  }
  const sequences = typeof stop === "string" ? [stop] : stop;
  return sequences.length > 0 ? sequences : undefined;
}

/**
 * Parse tool-call arguments; malformed JSON degrades to an empty object
 */
export function parseToolArguments(
  serialized: string,
): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(serialized);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return {};
  } catch {
    return {};
  }
}
