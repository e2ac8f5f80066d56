/**
 * Fastify Server Setup
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { healthRoutes, vconRoutes } from "./routes/index.js";
import { SchemaError, VconError, type VconErrorCode } from "./errors.js";
import { config } from "./config.js";
import { logger } from "./utils/logger.js";

/** HTTP status for each error code */
const STATUS_BY_CODE: Record<VconErrorCode, number> = {
  INVALID_JSON: 400,
  SCHEMA_MISMATCH: 400,
  DANGLING_REFERENCE: 400,
  MALFORMED_ENVELOPE: 400,
  MALFORMED_ENCODING: 400,
  UNSUPPORTED_ALGORITHM: 400,
  INVALID_SIGNATURE: 401,
  DECRYPTION_FAILED: 422,
  CONTENT_HASH_MISMATCH: 422,
  CONTENT_UNAVAILABLE: 422,
  DIRECTORY_NOT_FOUND: 404,
};

export async function buildServer(): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport:
        process.env["NODE_ENV"] !== "production"
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                translateTime: "SYS:standard",
                ignore: "pid,hostname",
              },
            }
          : undefined,
    },
    bodyLimit: config.maxVconSizeMb * 1024 * 1024,
  });

  // Register CORS
  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  // Register Swagger documentation
  await fastify.register(swagger, {
    openapi: {
      info: {
        title: "vCon Toolkit API",
        description:
          "Validate, migrate, sign (JWS) and encrypt (JWE) vCon conversation containers",
        version: "1.0.0",
        license: {
          name: "MIT",
        },
      },
      externalDocs: {
        url: "https://datatracker.ietf.org/doc/draft-ietf-vcon-vcon-core/",
        description: "vCon Container Specification",
      },
      servers: [
        {
          url: `http://localhost:${config.port}`,
          description: "Local development server",
        },
      ],
      tags: [
        { name: "health", description: "Health check endpoints" },
        { name: "vcon", description: "vCon processing endpoints" },
      ],
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      deepLinking: true,
    },
  });

  // Register routes
  await fastify.register(healthRoutes);
  await fastify.register(vconRoutes);

  // Global error handler
  fastify.setErrorHandler((error: Error & { validation?: unknown; statusCode?: number }, request, reply) => {
    if (error instanceof VconError) {
      const statusCode = STATUS_BY_CODE[error.code];
      logger.warn(
        { code: error.code, error: error.message, url: request.url },
        "Request rejected"
      );
      return reply.status(statusCode).send({
        error: error.message,
        code: error.code,
        details: error instanceof SchemaError ? error.details : undefined,
      });
    }

    logger.error(
      {
        error: error.message,
        stack: error.stack,
        url: request.url,
        method: request.method,
      },
      "Request error"
    );

    if (error.validation) {
      return reply.status(400).send({
        error: "Validation error",
        details: error.validation,
      });
    }

    // Body parser failures (malformed JSON, payload too large) carry their own status
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.message,
      });
    }

    return reply.status(500).send({
      error: "Internal server error",
    });
  });

  return fastify;
}
