import pino from "pino";
import { describe, expect, test, vi } from "vitest";
import { EWebClient, type EWebClientOptions } from "../src/eweb/client";
import { UpstreamFormatError, UpstreamRequestError } from "../src/errors";

type FetchInput = string | URL | Request;

const credentials = {
  baseUrl: new URL("https://eweb.test/api/"),
  apiKey: "test-key",
  accountId: "acct-1"
};

const salesParams = {
  startDate: new Date("2023-09-17T00:00:00.000Z"),
  endDate: new Date("2024-03-15T00:00:00.000Z"),
  brand: "Citizen"
};

function respond(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "application/json" } });
}

function firstCall<T>(calls: T[]): T {
  const [call] = calls;
  if (!call) {
    throw new Error("fetch was not called");
  }
  return call;
}

function createClient(
  handler: (input: FetchInput, init?: RequestInit) => Promise<Response>,
  overrides: Partial<EWebClientOptions> = {}
) {
  const fetchMock = vi.fn(handler);
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const client = new EWebClient({
    credentials,
    fetch: fetchMock,
    sleep,
    random: () => 0,
    logger: pino({ level: "silent" }),
    ...overrides
  });
  return { client, fetchMock, sleep };
}

describe("EWebClient requests", () => {
  test("builds the sales history request", async () => {
    const { client, fetchMock } = createClient(async () => respond(JSON.stringify({ rows: [] })));

    await expect(client.fetchSalesHistory(salesParams)).resolves.toEqual({ rows: [] });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = firstCall(fetchMock.mock.calls);
    expect(String(input)).toBe("https://eweb.test/api/sales/history?startDate=2023-09-17&endDate=2024-03-15&brand=Citizen");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      authorization: "Bearer test-key",
      accept: "application/json",
      "x-account-id": "acct-1"
    });
  });

  test("omits absent brand and paginates supplier stock", async () => {
    const { client, fetchMock } = createClient(async () => respond(JSON.stringify({ items: [] })), {
      credentials: { baseUrl: new URL("https://eweb.test"), apiKey: "test-key" },
      pageSize: 25
    });

    await client.fetchSupplierStock({ supplierId: "12345" });

    const [input, init] = firstCall(fetchMock.mock.calls);
    expect(String(input)).toBe("https://eweb.test/inventory/supplier-stock?supplierId=12345&page=1&pageSize=25");
    expect(init?.headers).toEqual({ authorization: "Bearer test-key", accept: "application/json" });
  });
});

describe("EWebClient failures", () => {
  test("retries 503 up to the attempt bound and surfaces the last error", async () => {
    const { client, fetchMock, sleep } = createClient(async () => respond("unavailable", 503));

    const error = await client.fetchSupplierStock({ supplierId: "12345" }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamRequestError);
    expect(error).toMatchObject({ status: 503, body: "unavailable", statusCode: 502 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 400]);
  });

  test("recovers when a retry succeeds", async () => {
    let calls = 0;
    const { client, fetchMock } = createClient(async () => {
      calls += 1;
      return calls === 1 ? respond("busy", 502) : respond(JSON.stringify({ items: [1] }));
    });

    await expect(client.fetchSupplierStock({ supplierId: "12345" })).resolves.toEqual({ items: [1] });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  test("never retries a 4xx response", async () => {
    const { client, fetchMock, sleep } = createClient(async () => respond("not found", 404));

    await expect(client.fetchSalesHistory(salesParams)).rejects.toMatchObject({
      name: "UpstreamRequestError",
      status: 404,
      body: "not found"
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  test("retries network failures and reports them without a status", async () => {
    const { client, fetchMock } = createClient(async () => {
      throw new TypeError("fetch failed");
    });

    const error = await client.fetchSalesHistory(salesParams).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamRequestError);
    expect(error).toMatchObject({ status: undefined, timedOut: false, statusCode: 502 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test("rejects bodies that are not a JSON object", async () => {
    const html = createClient(async () => respond("<html>oops</html>"));
    await expect(html.client.fetchSalesHistory(salesParams)).rejects.toBeInstanceOf(UpstreamFormatError);
    expect(html.fetchMock).toHaveBeenCalledTimes(1);

    const list = createClient(async () => respond("[1,2]"));
    await expect(list.client.fetchSalesHistory(salesParams)).rejects.toThrow("Upstream response is not a JSON object");
  });

  test("times out slow attempts", async () => {
    const { client } = createClient(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      { timeoutMs: 5, retry: { attempts: 1, baseDelayMs: 200 } }
    );

    await expect(client.fetchSupplierStock({ supplierId: "12345" })).rejects.toMatchObject({
      name: "UpstreamRequestError",
      timedOut: true,
      statusCode: 504
    });
  });

  test("retries an attempt that timed out", async () => {
    let calls = 0;
    const { client, fetchMock, sleep } = createClient(
      (_input, init) => {
        calls += 1;
        if (calls > 1) {
          return Promise.resolve(respond(JSON.stringify({ items: [] })));
        }
        return new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        });
      },
      { timeoutMs: 5 }
    );

    await expect(client.fetchSupplierStock({ supplierId: "12345" })).resolves.toEqual({ items: [] });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200]);
  });

  test("abandons the call when the caller aborts", async () => {
    const { client, fetchMock, sleep } = createClient(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const controller = new AbortController();
    const reason = new Error("client went away");

    const pending = client.fetchSupplierStock({ supplierId: "12345" }, { signal: controller.signal });
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  test("does not call upstream when already aborted", async () => {
    const { client, fetchMock } = createClient(async () => respond("{}"));
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(client.fetchSalesHistory(salesParams, { signal: controller.signal })).rejects.toThrow("cancelled");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
