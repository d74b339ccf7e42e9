import type { RetryPolicy, UpstreamCredentials } from "../config";
import { UpstreamFormatError, UpstreamRequestError } from "../errors";
import {
  formatCalendarDate,
  type SalesHistoryParameters,
  type SupplierStockParameters,
  type UpstreamPayload,
  upstreamPayloadSchema
} from "../intent/intent-model";
import { logger as defaultLogger, type Logger } from "../logger";
import { type Sleep, withRetry } from "./retry";

export const SALES_HISTORY_PATH = "/sales/history";
export const SUPPLIER_STOCK_PATH = "/inventory/supplier-stock";

type QueryValue = string | number | undefined;

export type EWebClientOptions = {
  credentials: UpstreamCredentials;
  timeoutMs?: number;
  pageSize?: number;
  retry?: RetryPolicy;
  fetch?: typeof fetch;
  sleep?: Sleep;
  random?: () => number;
  logger?: Logger;
};

export type CallOptions = {
  signal?: AbortSignal;
  traceId?: string;
};

export interface UpstreamClient {
  fetchSalesHistory(params: SalesHistoryParameters, options?: CallOptions): Promise<UpstreamPayload>;
  fetchSupplierStock(params: SupplierStockParameters, options?: CallOptions): Promise<UpstreamPayload>;
}

const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 200 };

export class EWebClient implements UpstreamClient {
  private readonly credentials: UpstreamCredentials;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: EWebClientOptions) {
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.pageSize = options.pageSize ?? 100;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? defaultLogger;
  }

  async fetchSalesHistory(params: SalesHistoryParameters, options: CallOptions = {}): Promise<UpstreamPayload> {
    return this.get(
      SALES_HISTORY_PATH,
      {
        startDate: formatCalendarDate(params.startDate),
        endDate: formatCalendarDate(params.endDate),
        brand: params.brand,
        sku: params.sku
      },
      options
    );
  }

  async fetchSupplierStock(params: SupplierStockParameters, options: CallOptions = {}): Promise<UpstreamPayload> {
    return this.get(
      SUPPLIER_STOCK_PATH,
      {
        supplierId: params.supplierId,
        brand: params.brand,
        page: 1,
        pageSize: this.pageSize
      },
      options
    );
  }

  buildUrl(path: string, query: Record<string, QueryValue>): URL {
    const base = this.credentials.baseUrl.toString().replace(/\/+$/, "");
    const url = new URL(`${base}/${path.replace(/^\/+/, "")}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined && value !== "") {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  headers(): Record<string, string> {
    return {
      authorization: `Bearer ${this.credentials.apiKey}`,
      accept: "application/json",
      ...(this.credentials.accountId ? { "x-account-id": this.credentials.accountId } : {})
    };
  }

  private async get(path: string, query: Record<string, QueryValue>, options: CallOptions): Promise<UpstreamPayload> {
    const url = this.buildUrl(path, query);
    const log = this.logger.child({ traceId: options.traceId ?? "system", path });
    return withRetry(this.retry, (attempt) => this.attempt(url, attempt, options.signal), {
      sleep: this.options.sleep,
      random: this.options.random,
      signal: options.signal,
      onRetry: ({ attempt, delayMs, error }) =>
        log.warn({ attempt, delayMs, error }, "Upstream request failed; retrying")
    });
  }

  private async attempt(url: URL, attempt: number, signal?: AbortSignal): Promise<UpstreamPayload> {
    signal?.throwIfAborted();
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      let response: Response;
      let body: string;
      try {
        response = await this.fetchImpl(url, { method: "GET", headers: this.headers(), signal: controller.signal });
        body = await response.text();
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason;
        }
        throw new UpstreamRequestError(
          timedOut
            ? `Upstream request timed out after ${this.timeoutMs}ms (attempt ${attempt})`
            : `Upstream request failed (attempt ${attempt})`,
          { timedOut, cause: error }
        );
      }

      if (!response.ok) {
        throw new UpstreamRequestError(`Upstream responded with status ${response.status}`, {
          status: response.status,
          body
        });
      }
      return parsePayload(body);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}

export function parsePayload(body: string): UpstreamPayload {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new UpstreamFormatError("Upstream response is not valid JSON", body);
  }
  const parsed = upstreamPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new UpstreamFormatError("Upstream response is not a JSON object", body);
  }
  return parsed.data;
}
