/* SPDX-License-Identifier: MIT */
import type { ServerResponse } from "node:http";
import { RequestFormatSchema, RequestFormats } from "@shared";
import type { FastifyPluginAsyncZod } from "fastify-type-provider-zod";
import { z } from "zod";
import { toStreamErrorFrame } from "@/errors";
import logger from "@/logging";
import type { ChatCompletionsDispatcher } from "./proxy/dispatcher";
import { getSSEHeaders, SSE_DONE_FRAME, writeSSEFrame } from "./proxy/utils/sse";

export interface ChatCompletionsRoutesOptions {
  dispatcher: Pick<ChatCompletionsDispatcher, "handle">;
}

const HealthResponseSchema = z.object({
  status: z.literal("healthy"),
  message: z.string(),
  supported_input_formats: z.array(RequestFormatSchema),
  model_routing: z.literal("enabled"),
  streaming_support: z.literal("enabled"),
  routing_method: z.literal("model_id_based"),
});

/**
 * Writes frames until the generator finishes or the client goes away, waiting
 * for the socket to drain between frames when it falls behind.
 * Leaving the loop early returns the generator, which closes the provider stream.
 */
async function pipeFrames(
  raw: ServerResponse,
  frames: AsyncGenerator<string, void, undefined>,
): Promise<void> {
  let disconnected = false;
  const onClose = () => {
    disconnected = true;
  };
  raw.on("close", onClose);
  raw.writeHead(200, getSSEHeaders());

  try {
    for await (const frame of frames) {
      if (disconnected) {
        logger.info("[ChatCompletionsRoutes] client disconnected, stopping stream");
        break;
      }
      await writeSSEFrame(raw, frame);
    }
    if (!disconnected) {
      await writeSSEFrame(raw, SSE_DONE_FRAME);
    }
  } catch (error) {
    logger.error({ err: error }, "[ChatCompletionsRoutes] failed writing stream");
    if (!disconnected) {
      raw.write(toStreamErrorFrame(error));
    }
  } finally {
    raw.off("close", onClose);
    raw.end();
  }
}

const chatCompletionsRoutes: FastifyPluginAsyncZod<
  ChatCompletionsRoutesOptions
> = async (fastify, { dispatcher }) => {
  fastify.post(
    "/v1/chat/completions",
    {
      schema: {
        description:
          "Create a chat completion from an OpenAI, Bedrock Claude or Bedrock Titan shaped body",
        tags: ["Chat"],
        querystring: z.object({
          target_format: z
            .string()
            .optional()
            .describe(
              "Response shape: openai, bedrock_claude or bedrock_titan. Defaults to openai",
            ),
        }),
      },
    },
    async (request, reply) => {
      const result = await dispatcher.handle(request.body, {
        targetFormat: request.query.target_format,
      });

      if (result.kind === "json") {
        return reply.status(result.statusCode).send(result.body);
      }

      reply.hijack();
      await pipeFrames(reply.raw, result.frames);
    },
  );

  fastify.get(
    "/v1/chat/completions/health",
    {
      schema: {
        description: "Health of the unified chat completions endpoint",
        tags: ["Chat"],
        response: { 200: HealthResponseSchema },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: "healthy",
        message: "Unified chat completions endpoint operational",
        supported_input_formats: RequestFormats,
        model_routing: "enabled",
        streaming_support: "enabled",
        routing_method: "model_id_based",
      });
    },
  );
};

export default chatCompletionsRoutes;
