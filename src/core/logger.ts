import pino from "pino";

const IS_TEST = process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);
const BASE_LEVEL = process.env.LOG_LEVEL ?? (IS_TEST ? "silent" : "info");

// stdout is reserved for the MCP stdio transport.
const root = pino({ name: "ensemble-fabric", level: BASE_LEVEL }, pino.destination(2));

export type Logger = pino.Logger;

export function createLogger(component: string): Logger {
  return root.child({ component });
}
