export { BedrockKnowledgeBaseClient } from "./client";
export type {
  CitationReference,
  KnowledgeBaseCitation,
  KnowledgeBaseClient,
  RetrieveAndGenerateParams,
  RetrieveAndGenerateResult,
  RetrievedPassage,
  RetrieveParams,
} from "./client";
export { KnowledgeBaseDetector } from "./detector";
export type { KnowledgeBaseSignals } from "./detector";
export {
  augmentMessages,
  buildContextPrompt,
  formatCitations,
  KnowledgeBaseEnhancer,
} from "./enhancer";
export type {
  EnhancementResult,
  KnowledgeBaseEnhancerOptions,
} from "./enhancer";
