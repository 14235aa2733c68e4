/* SPDX-License-Identifier: MIT */
export { default as Canonical } from "./canonical";
export { default as Bedrock } from "./llm-providers/bedrock";
export type {
  ChatAdapter,
  ProviderInvoker,
  ProviderPayload,
  ProviderStrategy,
  StreamContext,
} from "./llm-proxy";
