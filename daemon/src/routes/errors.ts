import type { FastifyInstance } from "fastify";
import { ViewerError } from "../errors.js";

interface ErrorMapping {
  status: number;
  action: string;
}

const BY_CODE: Record<string, ErrorMapping> = {
  INVALID_REQUEST: { status: 400, action: "Check the source name and query parameters" },
  NOT_FOUND: { status: 404, action: "Check the project and session ids and try again" },
  SOURCE_UNAVAILABLE: {
    status: 503,
    action: "Check the source root path in config.yaml or its environment variable",
  },
  SCAN_TIMEOUT: { status: 503, action: "Retry, or raise scan.timeoutMs in config.yaml" },
  CACHE_COMPUTE_FAILED: { status: 500, action: "Check the daemon logs for the underlying error" },
};

/** Every failure leaves as { error, message, action } with a status derived from its code. */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof ViewerError) {
      const mapping = BY_CODE[err.code] ?? { status: 500, action: "Check the daemon logs" };
      if (mapping.status >= 500) {
        request.log.warn({ err, code: err.code }, "Request failed");
      }
      return reply.code(mapping.status).send({
        error: err.code,
        message: err.message,
        action: mapping.action,
      });
    }

    if (err.validation) {
      return reply.code(400).send({
        error: "INVALID_REQUEST",
        message: err.message,
        action: BY_CODE.INVALID_REQUEST.action,
      });
    }

    request.log.error({ err }, "Unhandled error");
    return reply.code(500).send({
      error: "INTERNAL_ERROR",
      message: "Internal server error",
      action: "Check the daemon logs",
    });
  });

  app.setNotFoundHandler((request, reply) =>
    reply.code(404).send({
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      action: "Check the request path",
    }),
  );
}
