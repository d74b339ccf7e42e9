import pino from "pino";

export const logger = pino({
  name: "intent-service",
  level: process.env.LOG_LEVEL ?? "info"
});

export type { Logger } from "pino";
