import { buildApp } from "./app.js";
import { env } from "./config/env.js";
import { connectMongo, disconnectMongo } from "./db/mongo.js";
import { startMaturityWorker } from "./workers/maturity.worker.js";

async function start() {
  await connectMongo();
  const { app, ctx } = await buildApp();

  const maturityWorker = env.MATURITY_WORKER_ENABLED
    ? startMaturityWorker(ctx, {
        intervalMs: env.MATURITY_WORKER_INTERVAL_MS,
        batchLimit: env.MATURITY_WORKER_BATCH_LIMIT,
      })
    : null;

  const close = async (signal: string) => {
    app.log.info(`Shutting down (${signal})`);
    maturityWorker?.stop();
    await app.close();
    await disconnectMongo();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void close("SIGINT");
  });

  process.on("SIGTERM", () => {
    void close("SIGTERM");
  });

  await app.listen({
    port: env.PORT,
    host: "0.0.0.0",
  });

  void maturityWorker?.triggerNow();

  app.log.info(`API listening on ${env.PORT}`);
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
