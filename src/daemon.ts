#!/usr/bin/env node
import process from "node:process";
import { loadOrCreateConfig, getRuntimePaths, ensureRuntimeDirs } from "./config.js";
import { createChatgate } from "./app.js";
import { Db } from "./core/db.js";
import { Logger } from "./core/logger.js";
import { SignalCliAdapter } from "./adapters/signalCliAdapter.js";
import { processInboundBatch } from "./inbound.js";
import type { InboundContext } from "./inbound.js";

const logger = new Logger("daemon");

async function main(): Promise<void> {
  const projectRoot = process.env.CHATGATE_PROJECT_ROOT || process.cwd();
  const paths = getRuntimePaths(projectRoot);
  await ensureRuntimeDirs(paths);

  const cfg = await loadOrCreateConfig(paths);
  const db = new Db(paths.dbPath);
  await db.migrate();

  const { dispatcher } = createChatgate(cfg, db);
  const signal = new SignalCliAdapter(cfg.signal.command, cfg.signal.dataDir, cfg.signal.account);
  const ctx: InboundContext = { dispatcher, signal, responseChunkSize: cfg.routing.responseChunkSize };

  let running = true;
  const stop = async (): Promise<void> => {
    running = false;
    logger.info("shutdown requested");
    await db.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void stop();
  });
  process.on("SIGTERM", () => {
    void stop();
  });

  logger.info("chatgated started", { projectRoot, sessions: cfg.sessions.backend });

  while (running) {
    try {
      const events = await signal.receive(cfg.signal.receiveTimeoutSec);
      await processInboundBatch(events, ctx);
    } catch (err) {
      logger.error("loop error", { error: String(err) });
      await new Promise((resolve) => setTimeout(resolve, 1000));
    }
  }
}

void main().catch((err) => {
  logger.error("fatal daemon crash", { error: String(err) });
  process.exit(1);
});
