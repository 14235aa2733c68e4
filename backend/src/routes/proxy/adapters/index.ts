export { BedrockAdapter, SUPPORTED_BEDROCK_PREFIXES } from "./bedrock";
export {
  BedrockToOpenAIAdapter,
  toCanonicalRequest,
  toClaudeResponse,
  toTitanResponse,
} from "./bedrock-openai";
export type { BedrockStreamEncoder, BedrockWireFormat } from "./bedrock-openai";
export { finalizeChunkStream } from "./chunk-stream";
export { OpenAIAdapter } from "./openai";
export { AdapterRegistry, createAdapterRegistry } from "./registry";
export type { AdapterRegistryOptions } from "./registry";
