import type { CallOptions, UpstreamClient } from "./eweb/client";
import type { ResolvedIntent, ResponseEnvelope, UpstreamPayload } from "./intent/intent-model";
import { resolveIntent } from "./intent/intent-resolver";
import { logger as defaultLogger, type Logger } from "./logger";

export type IntentRequest = CallOptions & {
  query: string;
  supplierId?: string;
};

export type RequestOrchestrator = {
  handle: (request: IntentRequest) => Promise<ResponseEnvelope>;
};

export type OrchestratorDeps = {
  client: UpstreamClient;
  defaultSupplierId?: string;
  now?: () => Date;
  logger?: Logger;
};

function dispatch(client: UpstreamClient, intent: ResolvedIntent, options: CallOptions): Promise<UpstreamPayload> {
  switch (intent.kind) {
    case "sales_history":
      return client.fetchSalesHistory(intent.parameters, options);
    case "supplier_stock":
      return client.fetchSupplierStock(intent.parameters, options);
  }
}

export function createRequestOrchestrator(deps: OrchestratorDeps): RequestOrchestrator {
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? defaultLogger;

  return {
    async handle({ query, supplierId, signal, traceId }) {
      const intent = resolveIntent(query, { supplierId: supplierId ?? deps.defaultSupplierId }, now());
      const data = await dispatch(deps.client, intent, { signal, traceId });
      logger.info({ traceId: traceId ?? "system", intent: intent.kind }, "Intent request completed");
      return { intent: intent.kind, parameters: intent.parameters, data };
    }
  };
}
