/* SPDX-License-Identifier: MIT */
import { SupportedProvidersSchema } from "@shared";
import type { FastifyPluginAsyncZod } from "fastify-type-provider-zod";
import { z } from "zod";
import { listModelCatalog } from "./proxy/model-routing";

const ModelListResponseSchema = z.object({
  object: z.literal("list"),
  data: z.array(
    z.object({
      id: z.string(),
      object: z.literal("model"),
      owned_by: SupportedProvidersSchema,
    }),
  ),
});

const modelRoutes: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    "/v1/models",
    {
      schema: {
        description: "List the model aliases the gateway routes",
        tags: ["Models"],
        response: { 200: ModelListResponseSchema },
      },
    },
    async (_request, reply) => {
      return reply.send({
        object: "list",
        data: listModelCatalog().map(({ alias, provider }) => ({
          id: alias,
          object: "model" as const,
          owned_by: provider,
        })),
      });
    },
  );
};

export default modelRoutes;
