import { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { MissingParameterError, ServiceError, UpstreamRequestError } from "../errors";
import { serializeEnvelope } from "../intent/intent-model";
import { logger } from "../logger";
import type { RequestOrchestrator } from "../orchestrator";
import { getTraceIdFromRequest, withTraceId } from "../trace";

const intentRequestSchema = z.object({
  query: z.string().trim().min(1),
  supplierId: z.string().trim().min(1).optional()
});

export type RouteDeps = {
  orchestrator: RequestOrchestrator;
};

function errorBody(error: ServiceError, traceId: string) {
  return {
    message: error.message,
    code: error.code,
    traceId,
    ...(error instanceof MissingParameterError ? { parameter: error.parameter } : {}),
    ...(error instanceof UpstreamRequestError && error.status !== undefined
      ? { upstream: { status: error.status, body: error.body } }
      : {})
  };
}

/** Aborts when the caller goes away before the response is written. */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller;
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const handler = async (request: FastifyRequest, reply: FastifyReply) => {
    const traceId = getTraceIdFromRequest(request);
    const body = intentRequestSchema.safeParse(request.body);
    if (!body.success) {
      reply.code(400);
      return {
        message: body.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
        code: "INVALID_REQUEST",
        traceId
      };
    }

    const controller = abortOnDisconnect(reply);
    try {
      const envelope = await deps.orchestrator.handle({ ...body.data, signal: controller.signal, traceId });
      return serializeEnvelope(envelope);
    } catch (error) {
      if (error instanceof ServiceError) {
        withTraceId(logger, traceId).warn({ code: error.code, statusCode: error.statusCode }, error.message);
        reply.code(error.statusCode);
        return errorBody(error, traceId);
      }
      if (controller.signal.aborted) {
        withTraceId(logger, traceId).info("Client disconnected before the response was sent");
        reply.code(499);
        return { message: "Client closed request", traceId };
      }
      withTraceId(logger, traceId).error({ error }, "Intent request failed");
      throw error;
    }
  };

  app.post("/intent", handler);
  app.post("/v1/intent", handler);
}
