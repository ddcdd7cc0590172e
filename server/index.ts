import express from "express";
import { loadConfig } from "./config";
import { createPool, initDb } from "./db";
import { createWebhookDelivery, logDelivery } from "./dispatch/deliverPrompt";
import { DispatchLoop } from "./dispatch/dispatchLoop";
import { createPgLedgerStore } from "./ledger-storage";
import { registerRoutes } from "./routes";

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);
  await initDb(pool);

  const store = createPgLedgerStore(pool);
  const deliver = config.promptWebhookUrl
    ? createWebhookDelivery(config.promptWebhookUrl, config.promptWebhookToken ?? undefined)
    : logDelivery;
  if (!config.promptWebhookUrl) {
    console.log("[server] PROMPT_WEBHOOK_URL not set, prompts are only logged");
  }

  const dispatcher = new DispatchLoop(store, deliver, {
    tickIntervalMs: config.tickIntervalMs,
    deliveryTimeoutMs: config.deliveryTimeoutMs,
    backfillDays: config.backfillDays,
    skipCompleted: config.skipCompletedPrompts,
  });

  const app = express();
  app.use(express.json());
  const server = registerRoutes(app, {
    store,
    dispatcher,
    apiKey: config.apiKey,
    defaultTimezone: config.defaultTimezone,
    backfillDays: config.backfillDays,
  });

  await dispatcher.start();
  server.listen(config.port, () => {
    console.log(`[server] listening on port ${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[server] ${signal} received, shutting down`);
    await dispatcher.stop();
    await new Promise<void>(resolve => server.close(() => resolve()));
    await pool.end();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        console.error("[server] shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

main().catch(err => {
  console.error("[server] startup failed:", err);
  process.exit(1);
});
