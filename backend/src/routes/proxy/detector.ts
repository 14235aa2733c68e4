/**
 * Wire-format detection for inbound chat bodies. Pure: reads the body, never
 * mutates it.
 */
import { type RequestFormat, RequestFormatSchema } from "@shared";
import { isRecord, readArray } from "./utils/provider-json";

const CLAUDE_ONLY_FIELDS = ["system", "top_k", "stop_sequences"];
/** Claude fields the canonical request also accepts */
const CANONICAL_SHARED_FIELDS = ["top_k"];
const CLAUDE_TOOL_CHOICE_TYPES = ["auto", "any", "tool"];
const TITAN_CONFIG_FIELDS = [
  "maxTokenCount",
  "temperature",
  "topP",
  "stopSequences",
];
const SAMPLING_FIELDS = ["temperature", "max_tokens", "top_p"];

function has(body: Record<string, unknown>, field: string): boolean {
  return Object.hasOwn(body, field);
}

function hasMessagesArray(body: Record<string, unknown>): boolean {
  return Array.isArray(body.messages);
}

function firstTool(body: Record<string, unknown>): unknown {
  return readArray(body, "tools")[0];
}

export function isBedrockClaudeFormat(body: Record<string, unknown>): boolean {
  if (has(body, "anthropic_version")) {
    return true;
  }
  if (!has(body, "max_tokens") || !hasMessagesArray(body)) {
    return false;
  }

  // `model` without a top-level `system` reads as an OpenAI body that may
  // carry shared fields
  const openAiShaped = has(body, "model") && !has(body, "system");
  const hasClaudeFields = CLAUDE_ONLY_FIELDS.some(
    (field) =>
      has(body, field) &&
      !(openAiShaped && CANONICAL_SHARED_FIELDS.includes(field)),
  );
  const hasClaudeTools = readArray(body, "tools").some(
    (tool) =>
      isRecord(tool) &&
      has(tool, "name") &&
      has(tool, "description") &&
      has(tool, "input_schema"),
  );
  const toolChoice = body.tool_choice;
  const hasClaudeToolChoice =
    isRecord(toolChoice) &&
    typeof toolChoice.type === "string" &&
    CLAUDE_TOOL_CHOICE_TYPES.includes(toolChoice.type);

  return hasClaudeFields || hasClaudeTools || hasClaudeToolChoice;
}

export function isBedrockTitanFormat(body: Record<string, unknown>): boolean {
  const config = body.textGenerationConfig;
  return (
    has(body, "inputText") &&
    isRecord(config) &&
    TITAN_CONFIG_FIELDS.some((field) => has(config, field))
  );
}

/**
 * Claude is checked before Titan; anything unrecognised is treated as OpenAI
 * and left for request validation to reject.
 */
export function detectRequestFormat(body: unknown): RequestFormat {
  if (!isRecord(body)) {
    return RequestFormatSchema.enum.openai;
  }
  if (isBedrockClaudeFormat(body)) {
    return RequestFormatSchema.enum.bedrock_claude;
  }
  if (isBedrockTitanFormat(body)) {
    return RequestFormatSchema.enum.bedrock_titan;
  }
  return RequestFormatSchema.enum.openai;
}

/**
 * Per-format confidence scores in [0, 1], for logging
 */
export function getFormatConfidence(
  body: unknown,
): Record<RequestFormat, number> {
  const scores: Record<RequestFormat, number> = {
    openai: 0,
    bedrock_claude: 0,
    bedrock_titan: 0,
  };
  if (!isRecord(body)) {
    return scores;
  }

  const tool = firstTool(body);

  // ----- OpenAI -----
  if (has(body, "model")) scores.openai += 0.4;
  if (has(body, "messages")) scores.openai += 0.3;
  if (SAMPLING_FIELDS.some((field) => has(body, field))) scores.openai += 0.2;
  if (isRecord(tool) && tool.type === "function") scores.openai += 0.1;

  // ----- Claude -----
  if (has(body, "anthropic_version")) scores.bedrock_claude += 0.5;
  if (has(body, "max_tokens") && has(body, "messages")) {
    scores.bedrock_claude += 0.3;
  }
  if (has(body, "system")) scores.bedrock_claude += 0.1;
  if (isRecord(tool) && has(tool, "input_schema")) scores.bedrock_claude += 0.1;

  // ----- Titan -----
  if (has(body, "inputText")) scores.bedrock_titan += 0.5;
  const config = body.textGenerationConfig;
  if (isRecord(config) && has(config, "maxTokenCount")) {
    scores.bedrock_titan += 0.5;
  }

  for (const format of RequestFormatSchema.options) {
    scores[format] = Math.min(Math.round(scores[format] * 100) / 100, 1);
  }
  return scores;
}
