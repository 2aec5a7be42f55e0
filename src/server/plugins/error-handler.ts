/**
 * Fastify error handler plugin
 *
 * Maps the ingestion error classes to HTTP responses with the
 * `{ error, message, details?, requestId }` body.
 */

import fp from "fastify-plugin";

import {
  ConfigError,
  IngestError,
  LeaseError,
  NotFoundError,
  StorageError,
} from "../../errors.js";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

// ============================================================================
// Status Mapping
// ============================================================================

function statusFor(error: IngestError): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ConfigError) return 400;
  if (error instanceof LeaseError) return 409;
  if (error instanceof StorageError) return 503;
  return 500;
}

function detailsFor(error: IngestError): Record<string, unknown> | undefined {
  if (error instanceof ConfigError) {
    return { problems: error.problems };
  }
  if (error instanceof NotFoundError) {
    return { resource: error.resource, id: error.id };
  }
  return undefined;
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const requestId = request.id;

      // Handle Fastify validation errors
      if (error.validation) {
        const response: ApiError = {
          error: "VALIDATION_ERROR",
          message: "Invalid request parameters",
          details: {
            validation: error.validation,
          },
          requestId,
        };
        return reply.status(400).send(response);
      }

      if (error instanceof IngestError) {
        const status = statusFor(error);
        if (status >= 500) {
          request.log.error(error, "Request failed");
        }
        const response: ApiError = {
          error: error.code,
          message: status === 500 ? "An unexpected error occurred" : error.message,
          details: detailsFor(error),
          requestId,
        };
        return reply.status(status).send(response);
      }

      // Malformed JSON bodies and other client errors raised by Fastify
      if (
        error.statusCode !== undefined &&
        error.statusCode >= 400 &&
        error.statusCode < 500
      ) {
        const response: ApiError = {
          error: error.code,
          message: error.message,
          requestId,
        };
        return reply.status(error.statusCode).send(response);
      }

      // Log unexpected errors
      request.log.error(error, "Unhandled error");

      // Return generic error for unexpected errors
      const response: ApiError = {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId,
      };
      return reply.status(500).send(response);
    }
  );

  // Handle 404 for unknown routes
  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const response: ApiError = {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    };
    return reply.status(404).send(response);
  });
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
