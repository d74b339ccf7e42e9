import type { FastifyReply, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";

const TRACE_HEADER = "x-trace-id";

function normalizeHeader(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

export function ensureTraceId(headers?: Record<string, string | string[] | undefined>): string {
  const candidate = headers ? normalizeHeader(headers[TRACE_HEADER]) : undefined;
  if (candidate && candidate.trim().length > 0) {
    return candidate;
  }
  return uuidv4();
}

export function getTraceIdFromRequest(request: Pick<FastifyRequest, "headers">): string {
  return ensureTraceId(request.headers);
}

/** Pins the trace id on the request headers so later handlers read the same one. */
export function propagateTraceId(request: FastifyRequest, reply: FastifyReply): string {
  const traceId = getTraceIdFromRequest(request);
  request.headers[TRACE_HEADER] = traceId;
  reply.header(TRACE_HEADER, traceId);
  return traceId;
}

export function withTraceId(logger: Logger, traceId: string): Logger {
  return logger.child({ traceId });
}
