import path from "node:path";
import { fileURLToPath } from "node:url";

import { createLogger, openLogSink, screenEnv } from "@concrete-screen/core";

import { buildApp } from "./app.js";

const PORT = Number(process.env.PORT || 8787);
const HOST = process.env.HOST || "0.0.0.0";

export async function start(): Promise<void> {
  const env = screenEnv();
  const logger = createLogger("screen-api", openLogSink(env.logTarget ?? "-"), env.logLevel);
  const app = buildApp({ logger });
  await app.listen({ port: PORT, host: HOST });
  logger.info("listening", { host: HOST, port: PORT });
}

const entryPath = fileURLToPath(import.meta.url);
const invokedPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (entryPath === invokedPath) {
  start().catch((err: unknown) => {
    process.stderr.write(`[screen-api] failed to start: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
}
