import { z } from "zod";

export const intentKindSchema = z.enum(["supplier_stock", "sales_history"]);

export type IntentKind = z.infer<typeof intentKindSchema>;

export type SalesHistoryParameters = {
  readonly startDate: Date;
  readonly endDate: Date;
  readonly brand?: string;
  readonly sku?: string;
};

export type SupplierStockParameters = {
  readonly supplierId: string;
  readonly brand?: string;
};

export type ResolvedIntent =
  | { readonly kind: "sales_history"; readonly parameters: SalesHistoryParameters }
  | { readonly kind: "supplier_stock"; readonly parameters: SupplierStockParameters };

export type ParameterSet = ResolvedIntent["parameters"];

export type ResolverDefaults = {
  supplierId?: string;
};

export const upstreamPayloadSchema = z.record(z.unknown());

export type UpstreamPayload = z.infer<typeof upstreamPayloadSchema>;

export type ResponseEnvelope = {
  intent: IntentKind;
  parameters: ParameterSet;
  data: UpstreamPayload;
};

/** Calendar dates travel as YYYY-MM-DD; absent optional parameters are left out. */
export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export type WireParameters = Record<string, string>;

export function serializeParameters(parameters: ParameterSet): WireParameters {
  const wire: WireParameters = {};
  for (const [key, value] of Object.entries(parameters)) {
    if (value instanceof Date) {
      wire[key] = formatCalendarDate(value);
    } else if (typeof value === "string") {
      wire[key] = value;
    }
  }
  return wire;
}

export function serializeEnvelope(envelope: ResponseEnvelope) {
  return {
    intent: envelope.intent,
    parameters: serializeParameters(envelope.parameters),
    data: envelope.data
  };
}
