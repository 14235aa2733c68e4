import Fastify, { type FastifyError } from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import type { Config, ProviderDefaults } from "@/config";
import { RequestValidationError, toErrorResponse } from "@/errors";
import logger from "@/logging";
import { chatCompletionsRoutes, metricsRoutes, modelRoutes } from "@/routes";
import {
  type AdapterRegistry,
  createAdapterRegistry,
} from "@/routes/proxy/adapters";
import { ChatCompletionsDispatcher } from "@/routes/proxy/dispatcher";
import { FileContextService, S3FileStore } from "@/services/file-context";
import {
  BedrockKnowledgeBaseClient,
  KnowledgeBaseEnhancer,
} from "@/services/knowledge-base";

export interface AppOptions {
  dispatcher: Pick<ChatCompletionsDispatcher, "handle">;
  bodyLimit?: number;
  metricsEnabled?: boolean;
}

/**
 * Fastify instance with the gateway routes; errors that escape a route
 * (malformed JSON, oversized bodies) get the same error body as the dispatcher
 */
export async function buildApp({
  dispatcher,
  bodyLimit,
  metricsEnabled = false,
}: AppOptions) {
  const app = Fastify({
    loggerInstance: logger,
    disableRequestLogging: true,
    ...(bodyLimit !== undefined ? { bodyLimit } : {}),
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      const { statusCode, body } = toErrorResponse(
        new RequestValidationError(error.message),
      );
      return reply.status(statusCode).send(body);
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          message: error.message,
          type: "invalid_request_error",
          code: error.code ?? null,
        },
      });
    }
    logger.error(
      { err: error, url: request.url },
      "[App] unhandled route error",
    );
    const { statusCode, body } = toErrorResponse(error);
    return reply.status(statusCode).send(body);
  });

  await app.register(chatCompletionsRoutes, { dispatcher });
  await app.register(modelRoutes);
  if (metricsEnabled) {
    await app.register(metricsRoutes);
  }

  return app;
}

/**
 * Dispatcher wired to the real AWS and OpenAI clients. File context is only
 * available when a bucket is configured.
 */
export function createDispatcher(
  config: Config,
  defaults: ProviderDefaults,
  registry: AdapterRegistry = createAdapterRegistry(config, defaults),
): ChatCompletionsDispatcher {
  const retry = { maxAttempts: config.llm.retry.maxAttempts };
  const knowledgeBase = new KnowledgeBaseEnhancer({
    client: BedrockKnowledgeBaseClient.fromConfig(config.llm.bedrock, retry),
    region: config.llm.bedrock.region,
  });

  const bucket = config.files.bucket;
  const fileContext = bucket
    ? new FileContextService(S3FileStore.fromConfig(bucket, config.llm.bedrock))
    : undefined;
  if (!fileContext) {
    logger.info("[App] S3_FILES_BUCKET not set, file context disabled");
  }

  return new ChatCompletionsDispatcher({ registry, knowledgeBase, fileContext });
}
