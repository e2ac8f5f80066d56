/**
 * Health check routes
 */

import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import { getEncryptionKey, getSigningKey } from "../services/keys.js";

export async function healthRoutes(
  fastify: FastifyInstance,
  _opts: FastifyPluginOptions
) {
  // Basic liveness check
  fastify.get(
    "/health",
    {
      schema: {
        description: "Basic health check",
        tags: ["health"],
        response: {
          200: {
            type: "object",
            properties: {
              status: { type: "string" },
              timestamp: { type: "string" },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({
        status: "ok",
        timestamp: new Date().toISOString(),
      });
    }
  );

  // Readiness check (reports which keys are configured)
  fastify.get(
    "/health/ready",
    {
      schema: {
        description: "Readiness check including signing and encryption keys",
        tags: ["health"],
        response: {
          200: {
            type: "object",
            properties: {
              status: { type: "string" },
              timestamp: { type: "string" },
              services: {
                type: "object",
                properties: {
                  signing: {
                    type: "object",
                    properties: {
                      status: { type: "string" },
                    },
                  },
                  encryption: {
                    type: "object",
                    properties: {
                      status: { type: "string" },
                    },
                  },
                },
              },
            },
          },
        },
      },
    },
    async (_request, reply) => {
      const keyStatus = (configured: boolean) => ({
        status: configured ? "configured" : "not_configured",
      });

      return reply.send({
        status: "ok",
        timestamp: new Date().toISOString(),
        services: {
          signing: keyStatus(getSigningKey() !== undefined),
          encryption: keyStatus(getEncryptionKey() !== undefined),
        },
      });
    }
  );
}
