import { z } from "zod";

/**
 * Backend providers a model id can be routed to
 */
export const SupportedProvidersSchema = z.enum(["openai", "bedrock"]);

/**
 * Bedrock model families, one Strategy each
 */
export const BedrockModelFamilySchema = z.enum([
  "claude",
  "titan",
  "nova",
  "ai21",
  "cohere",
  "meta",
  "mistral",
  "stability",
  "writer",
]);

/**
 * Wire shapes a request can arrive in and a response can be emitted in
 */
export const RequestFormatSchema = z.enum([
  "openai",
  "bedrock_claude",
  "bedrock_titan",
]);

/**
 * Keys of the per-provider generation defaults table
 */
export const ModelDefaultsKeySchema = z.enum([
  "openai",
  "claude",
  "titan",
  "nova",
  "ai21",
  "cohere",
  "meta",
  "mistral",
  "stability",
  "writer",
]);

export const RequestFormats = Object.values(RequestFormatSchema.enum);

export type SupportedProvider = z.infer<typeof SupportedProvidersSchema>;
export type BedrockModelFamily = z.infer<typeof BedrockModelFamilySchema>;
export type RequestFormat = z.infer<typeof RequestFormatSchema>;
export type ModelDefaultsKey = z.infer<typeof ModelDefaultsKeySchema>;
