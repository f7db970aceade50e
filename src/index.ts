import { buildApp } from "./app.js";
import { config } from "./config.js";
import { loadPageQueries } from "./lib/pageQueries.js";
import { createPageStore } from "./lib/pageStore.js";

const start = async (): Promise<void> => {
  const queries = await loadPageQueries(config.queriesFile);
  const store = createPageStore({ filename: config.databaseFile, queries });
  const app = await buildApp({
    store,
    logger: { level: config.logLevel }
  });

  app.addHook("onClose", async () => {
    await store.close();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          app.log.error(error, "Shutdown failed");
          process.exit(1);
        }
      );
    });
  }

  try {
    await store.ensureSchema();
    app.log.info({ database: config.databaseFile, customQueries: Boolean(config.queriesFile) }, "Page store ready");

    await app.listen({
      port: config.port,
      host: config.host
    });
  } catch (error) {
    app.log.error(error);
    process.exit(1);
  }
};

start().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
