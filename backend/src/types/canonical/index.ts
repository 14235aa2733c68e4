/* SPDX-License-Identifier: MIT */
/**
 * Canonical model - the provider-agnostic request / response / chunk types
 * every adapter converts to and from.
 */
import type { z } from "zod";
import * as CanonicalAPI from "./api";
import * as CanonicalMessages from "./messages";
import * as CanonicalTools from "./tools";

namespace Canonical {
  export const API = CanonicalAPI;
  export const Messages = CanonicalMessages;
  export const Tools = CanonicalTools;

  export namespace Types {
    export type ChatCompletionRequest = z.infer<
      typeof CanonicalAPI.ChatCompletionRequestSchema
    >;
    export type ChatCompletionResponse = z.infer<
      typeof CanonicalAPI.ChatCompletionResponseSchema
    >;
    export type ChatCompletionChunk = z.infer<
      typeof CanonicalAPI.ChatCompletionChunkSchema
    >;
    export type Choice = z.infer<typeof CanonicalAPI.ChoiceSchema>;
    export type ChunkChoice = z.infer<typeof CanonicalAPI.ChunkChoiceSchema>;
    export type Usage = z.infer<typeof CanonicalAPI.ChatCompletionUsageSchema>;
    export type FinishReason = z.infer<typeof CanonicalAPI.FinishReasonSchema>;
    export type FinishReasonValue = z.infer<
      typeof CanonicalAPI.FinishReasonValueSchema
    >;
    export type CitationFormat = z.infer<
      typeof CanonicalAPI.CitationFormatSchema
    >;
    export type KnowledgeBaseMetadata = z.infer<
      typeof CanonicalAPI.KnowledgeBaseMetadataSchema
    >;

    export type Message = z.infer<typeof CanonicalMessages.MessageParamSchema>;
    export type Role = Message["role"];
    export type Content = z.infer<typeof CanonicalMessages.ContentSchema>;
    export type ContentBlock = z.infer<
      typeof CanonicalMessages.ContentBlockSchema
    >;
    export type TextBlock = z.infer<typeof CanonicalMessages.TextBlockSchema>;
    export type ImageBlock = z.infer<typeof CanonicalMessages.ImageBlockSchema>;
    export type ToolUseBlock = z.infer<
      typeof CanonicalMessages.ToolUseBlockSchema
    >;
    export type ToolCall = z.infer<typeof CanonicalMessages.ToolCallSchema>;
    export type ResponseMessage = z.infer<
      typeof CanonicalMessages.ResponseMessageSchema
    >;
    export type ChunkDelta = z.infer<typeof CanonicalMessages.ChunkDeltaSchema>;
    export type ToolCallDelta = z.infer<
      typeof CanonicalMessages.ToolCallDeltaSchema
    >;

    export type Tool = z.infer<typeof CanonicalTools.ToolSchema>;
    export type ToolChoice = z.infer<
      typeof CanonicalTools.ToolChoiceOptionSchema
    >;
  }
}

export default Canonical;
