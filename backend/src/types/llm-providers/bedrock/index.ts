/* SPDX-License-Identifier: MIT */
/**
 * Bedrock-native request / response shapes a caller may speak directly.
 *
 * Only Claude (messages API) and Titan Text are accepted as inbound shapes
 * and produced as outbound shapes; the other families are reached through
 * their Strategies and never exposed on the wire.
 */
import type { z } from "zod";
import * as ClaudeSchemas from "./claude";
import * as TitanSchemas from "./titan";

namespace Bedrock {
  export const Claude = ClaudeSchemas;
  export const Titan = TitanSchemas;

  export namespace Types {
    export type ClaudeRequest = z.infer<typeof ClaudeSchemas.RequestSchema>;
    export type ClaudeMessage = z.infer<typeof ClaudeSchemas.MessageSchema>;
    export type ClaudeContentBlock = z.infer<
      typeof ClaudeSchemas.ContentBlockSchema
    >;
    export type ClaudeTool = z.infer<typeof ClaudeSchemas.ToolSchema>;
    export type ClaudeToolChoice = z.infer<typeof ClaudeSchemas.ToolChoiceSchema>;
    export type ClaudeResponse = z.infer<typeof ClaudeSchemas.ResponseSchema>;
    export type ClaudeStopReason = z.infer<typeof ClaudeSchemas.StopReasonSchema>;
    export type ClaudeUsage = z.infer<typeof ClaudeSchemas.UsageSchema>;
    export type ClaudeStreamEvent = z.infer<
      typeof ClaudeSchemas.StreamEventSchema
    >;

    export type TitanRequest = z.infer<typeof TitanSchemas.RequestSchema>;
    export type TitanResponse = z.infer<typeof TitanSchemas.ResponseSchema>;
    export type TitanCompletionReason = z.infer<
      typeof TitanSchemas.CompletionReasonSchema
    >;
    export type TitanStreamEvent = z.infer<typeof TitanSchemas.StreamEventSchema>;

    export type Request = ClaudeRequest | TitanRequest;
    export type Response = ClaudeResponse | TitanResponse;
    export type StreamEvent = ClaudeStreamEvent | TitanStreamEvent;
  }
}

export default Bedrock;
