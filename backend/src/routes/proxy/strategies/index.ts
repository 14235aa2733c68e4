import type { BedrockModelFamily } from "@shared";
import { Ai21Strategy } from "./ai21";
import type { BedrockStrategyClass } from "./base";
import { ClaudeStrategy } from "./claude";
import { CohereStrategy } from "./cohere";
import { MetaStrategy } from "./meta";
import { MistralStrategy } from "./mistral";
import { NovaStrategy } from "./nova";
import { StabilityStrategy } from "./stability";
import { TitanStrategy } from "./titan";
import { WriterStrategy } from "./writer";

export { BaseBedrockStrategy } from "./base";
export type { BedrockStrategyClass } from "./base";

/**
 * Bedrock model id prefix -> Strategy. Ids are matched after any regional
 * inference-profile prefix (`us.`, `eu.`, `apac.`) is stripped.
 */
export const BEDROCK_STRATEGY_PREFIXES: ReadonlyArray<{
  prefix: string;
  family: BedrockModelFamily;
  strategy: BedrockStrategyClass;
}> = [
  { prefix: "anthropic.claude", family: "claude", strategy: ClaudeStrategy },
  { prefix: "amazon.titan", family: "titan", strategy: TitanStrategy },
  { prefix: "amazon.nova", family: "nova", strategy: NovaStrategy },
  { prefix: "ai21.", family: "ai21", strategy: Ai21Strategy },
  { prefix: "cohere.", family: "cohere", strategy: CohereStrategy },
  { prefix: "meta.", family: "meta", strategy: MetaStrategy },
  { prefix: "mistral.", family: "mistral", strategy: MistralStrategy },
  { prefix: "stability.", family: "stability", strategy: StabilityStrategy },
  { prefix: "writer.", family: "writer", strategy: WriterStrategy },
];

const BY_LONGEST_PREFIX = [...BEDROCK_STRATEGY_PREFIXES].sort(
  (a, b) => b.prefix.length - a.prefix.length,
);

const REGION_PREFIX_PATTERN = /^(us|eu|apac|us-gov|global)\./;

export function stripRegionPrefix(modelId: string): string {
  return modelId.replace(REGION_PREFIX_PATTERN, "");
}

/**
 * Strategy entry for a Bedrock model id, or undefined when no prefix matches.
 * Embedding models never resolve.
 */
export function findStrategyEntry(modelId: string) {
  const baseId = stripRegionPrefix(modelId);
  if (baseId.includes("embed")) {
    return undefined;
  }
  return BY_LONGEST_PREFIX.find(({ prefix }) => baseId.startsWith(prefix));
}

export {
  Ai21Strategy,
  ClaudeStrategy,
  CohereStrategy,
  MetaStrategy,
  MistralStrategy,
  NovaStrategy,
  StabilityStrategy,
  TitanStrategy,
  WriterStrategy,
};
