import type { FastifyPluginAsyncZod } from "fastify-type-provider-zod";
import { collectMetrics } from "@/metrics";

const metricsRoutes: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    "/metrics",
    {
      schema: {
        description: "Prometheus metrics",
        tags: ["Metrics"],
      },
    },
    async (_request, reply) => {
      const { contentType, body } = await collectMetrics();
      return reply.type(contentType).send(body);
    },
  );
};

export default metricsRoutes;
