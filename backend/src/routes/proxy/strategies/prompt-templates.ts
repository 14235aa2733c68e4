/**
 * Flat-prompt renderers for the families whose API takes a single prompt
 * string instead of a message list.
 */
import type { Canonical } from "@/types";
import { contentToText } from "../utils/content";

type Message = Canonical.Types.Message;

/**
 * Line-per-turn prompt: `System: ...`, `User: ...`, `Bot: ...`
 */
export interface RolePrefixTemplate {
  system: string;
  user: string;
  assistant: string;
  tool: (name: string | undefined) => string;
  separator: string;
  /** Appended when the last turn is not the assistant's */
  cue: string;
}

export function renderRolePrefixedPrompt(
  template: RolePrefixTemplate,
  systemPrompt: string | null,
  messages: Message[],
): string {
  const parts: string[] = [];
  if (systemPrompt !== null) {
    parts.push(`${template.system}${systemPrompt}`);
  }

  for (const message of messages) {
    const text = contentToText(message.content);
    switch (message.role) {
      case "user":
        parts.push(`${template.user}${text}`);
        break;
      case "assistant":
        parts.push(`${template.assistant}${text}`);
        break;
      case "tool":
        parts.push(`${template.tool(message.name)}${text}`);
        break;
      case "system":
        parts.push(`${template.system}${text}`);
        break;
    }
  }

  if (messages.at(-1)?.role !== "assistant") {
    parts.push(template.cue);
  }
  return parts.join(template.separator);
}

/**
 * `[INST]`-delimited prompt used by Llama and Mistral instruct models
 */
export interface InstructionTemplate {
  /** Opening segment, with the system prompt folded in when present */
  open: (systemPrompt: string | null) => string;
  assistant: (text: string) => string;
}

const TURN_OPEN = "<s>[INST] ";
const TURN_CLOSE = "[/INST]";

export function renderInstructionPrompt(
  template: InstructionTemplate,
  systemPrompt: string | null,
  messages: Message[],
): string {
  const parts: string[] = [template.open(systemPrompt)];
  // The opening segment already holds `<s>[INST]` for the first turn
  let turnOpen = true;

  for (const message of messages) {
    const text = contentToText(message.content);
    switch (message.role) {
      case "user":
      case "system":
        parts.push(`${turnOpen ? "" : TURN_OPEN}${text} ${TURN_CLOSE}`);
        turnOpen = false;
        break;
      case "tool":
        parts.push(
          `${turnOpen ? "" : TURN_OPEN}Tool Response: ${text} ${TURN_CLOSE}`,
        );
        turnOpen = false;
        break;
      case "assistant":
        parts.push(template.assistant(text));
        turnOpen = false;
        break;
    }
  }

  const prompt = parts.join("");
  if (messages.at(-1)?.role !== "assistant" && !prompt.endsWith(TURN_CLOSE)) {
    return `${prompt} ${TURN_CLOSE}`;
  }
  return prompt;
}
