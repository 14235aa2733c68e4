/**
 * Model id -> provider resolution and the short-name alias catalogue
 */
import {
  type BedrockModelFamily,
  type SupportedProvider,
  SupportedProvidersSchema,
} from "@shared";
import { z } from "zod";
import aliasTable from "./bedrock-model-aliases.json";
import { findStrategyEntry } from "./strategies";

const BEDROCK_MODEL_ALIASES: Readonly<Record<string, string>> = z
  .record(z.string(), z.string())
  .parse(aliasTable);

const OPENAI_ID_PREFIXES = ["gpt-", "text-", "o1", "o3", "o4", "chatgpt-", "ft:gpt-"];

const BEDROCK_ID_PREFIXES = [
  "anthropic.",
  "amazon.",
  "ai21.",
  "cohere.",
  "meta.",
  "mistral.",
  "stability.",
  "writer.",
];

const REGION_QUALIFIED_PATTERN = /^(us|eu|apac|us-gov|global)\.[a-z0-9-]+\./;

export interface ModelCatalogEntry {
  alias: string;
  modelId: string;
  provider: SupportedProvider;
  family: BedrockModelFamily | undefined;
}

/**
 * Map a short alias (`nova-lite`) to its Bedrock id; other ids are returned unchanged
 */
export function resolveBedrockModelId(modelId: string): string {
  return Object.hasOwn(BEDROCK_MODEL_ALIASES, modelId)
    ? BEDROCK_MODEL_ALIASES[modelId]
    : modelId;
}

export function resolveProvider(modelId: string): SupportedProvider {
  const id = modelId.toLowerCase();

  if (
    OPENAI_ID_PREFIXES.some((prefix) => id.startsWith(prefix)) ||
    id.includes("openai")
  ) {
    return SupportedProvidersSchema.enum.openai;
  }
  if (
    BEDROCK_ID_PREFIXES.some((prefix) => id.startsWith(prefix)) ||
    id.includes("bedrock") ||
    REGION_QUALIFIED_PATTERN.test(id) ||
    Object.hasOwn(BEDROCK_MODEL_ALIASES, modelId)
  ) {
    return SupportedProvidersSchema.enum.bedrock;
  }
  return SupportedProvidersSchema.enum.openai;
}

/**
 * Provider plus the id the provider is invoked with
 */
export function routeModel(modelId: string): {
  provider: SupportedProvider;
  modelId: string;
} {
  const provider = resolveProvider(modelId);
  return {
    provider,
    modelId: provider === "bedrock" ? resolveBedrockModelId(modelId) : modelId,
  };
}

export function listModelCatalog(): ModelCatalogEntry[] {
  return Object.entries(BEDROCK_MODEL_ALIASES).map(([alias, modelId]) => ({
    alias,
    modelId,
    provider: "bedrock",
    family: findStrategyEntry(modelId)?.family,
  }));
}
