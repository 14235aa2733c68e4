/**
 * Metrics Module
 *
 * Centralizes the Prometheus metrics for chat completion traffic:
 * request duration, tokens, time to first token and stream errors.
 */
export {
  collectMetrics,
  initializeMetrics,
  type LLMMetricContext,
  reportLLMRequestDuration,
  reportLLMTokens,
  reportStreamError,
  reportTimeToFirstToken,
} from "./llm";
