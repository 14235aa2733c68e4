/**
 * Prometheus metrics for chat completion traffic.
 */
import type { SupportedProvider } from "@shared";
import client from "prom-client";
import logger from "@/logging";

let requestDurationHistogram: client.Histogram<string> | undefined;
let tokensCounter: client.Counter<string> | undefined;
let timeToFirstTokenHistogram: client.Histogram<string> | undefined;
let streamErrorsCounter: client.Counter<string> | undefined;

let warnedUninitialized = false;

/**
 * Initialize LLM metrics.
 * Should be called once during application startup.
 */
export function initializeMetrics(): void {
  if (requestDurationHistogram) {
    logger.info("[LLMMetrics] Metrics already initialized, skipping");
    return;
  }

  requestDurationHistogram = new client.Histogram({
    name: "llm_request_duration_seconds",
    help: "Duration of chat completion requests in seconds",
    labelNames: ["provider", "model", "status", "stream"],
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60, 120],
  });

  tokensCounter = new client.Counter({
    name: "llm_tokens_total",
    help: "Tokens consumed by chat completions",
    labelNames: ["provider", "model", "type"],
  });

  timeToFirstTokenHistogram = new client.Histogram({
    name: "llm_time_to_first_token_seconds",
    help: "Time from request start to the first streamed chunk in seconds",
    labelNames: ["provider", "model"],
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  });

  streamErrorsCounter = new client.Counter({
    name: "llm_stream_errors_total",
    help: "Streams that ended with an error frame",
    labelNames: ["provider", "error_type"],
  });

  logger.info("[LLMMetrics] Metrics initialized");
}

function warnUninitialized(): void {
  if (warnedUninitialized) {
    return;
  }
  warnedUninitialized = true;
  logger.warn("[LLMMetrics] Metrics not initialized, skipping reporting");
}

export interface LLMMetricContext {
  provider: SupportedProvider;
  model: string;
}

export function reportLLMRequestDuration(
  context: LLMMetricContext & { status: number; stream: boolean },
  durationSeconds: number,
): void {
  if (!requestDurationHistogram) {
    warnUninitialized();
    return;
  }
  requestDurationHistogram.observe(
    {
      provider: context.provider,
      model: context.model,
      status: String(context.status),
      stream: context.stream ? "true" : "false",
    },
    durationSeconds,
  );
}

export function reportLLMTokens(
  context: LLMMetricContext,
  usage: { prompt_tokens: number; completion_tokens: number },
): void {
  if (!tokensCounter) {
    warnUninitialized();
    return;
  }
  const labels = { provider: context.provider, model: context.model };
  if (usage.prompt_tokens > 0) {
    tokensCounter.inc({ ...labels, type: "input" }, usage.prompt_tokens);
  }
  if (usage.completion_tokens > 0) {
    tokensCounter.inc({ ...labels, type: "output" }, usage.completion_tokens);
  }
}

export function reportTimeToFirstToken(
  context: LLMMetricContext,
  seconds: number,
): void {
  if (!timeToFirstTokenHistogram) {
    warnUninitialized();
    return;
  }
  timeToFirstTokenHistogram.observe(
    { provider: context.provider, model: context.model },
    seconds,
  );
}

export function reportStreamError(
  provider: SupportedProvider,
  errorType: string,
): void {
  if (!streamErrorsCounter) {
    warnUninitialized();
    return;
  }
  streamErrorsCounter.inc({ provider, error_type: errorType });
}

/**
 * Exposition body and content type for the /metrics endpoint
 */
export async function collectMetrics(): Promise<{
  contentType: string;
  body: string;
}> {
  return {
    contentType: client.register.contentType,
    body: await client.register.metrics(),
  };
}
