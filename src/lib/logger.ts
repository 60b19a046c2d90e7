import pino, { type Logger, type TransportSingleOptions } from "pino";
import { createRequire } from "module";

export type { Logger };

const env = process.env.NODE_ENV || "development";
const level = process.env.LOG_LEVEL || (env === "production" ? "info" : env === "test" ? "silent" : "debug");

let transport: TransportSingleOptions | undefined;
if (env !== "production" && env !== "test") {
  try {
    const require = createRequire(import.meta.url);
    require.resolve("pino-pretty");
    transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        ignore: "pid,hostname",
      },
    };
  } catch {
    transport = undefined;
  }
}

export const logger = pino({ name: "policy-object-sync", level, transport });
