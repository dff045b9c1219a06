import Fastify from "fastify";
import cors from "@fastify/cors";

import { loadServerConfig } from "./config/server_config";
import { healthRoutes } from "./routes/healthz";
import { experimentRoutes } from "./routes/experiments";
import { userRoutes } from "./routes/users";
import { MemoryAnnotationStore, type AnnotationStore } from "./store/annotation_store";
import { SqliteAnnotationStore } from "./store/sqlite_annotation_store";

const config = loadServerConfig();

const app = Fastify({
  logger: {
    level: config.logLevel,
  },
});

const openStore = (): AnnotationStore =>
  config.store === "memory"
    ? new MemoryAnnotationStore()
    : new SqliteAnnotationStore(config.dbPath, app.log);

async function main() {
  const store = openStore();

  await app.register(cors, {
    origin: config.corsOrigin,
  });

  // Routes
  await app.register(healthRoutes);
  await app.register(experimentRoutes, {
    prefix: "/api",
    experiments: store,
    assignments: store.assignments,
    filePairs: store.filePairs,
  });
  await app.register(userRoutes, {
    prefix: "/api",
    users: store.users,
    version: config.version,
  });

  app.log.info({ evt: "server.config", store: config.store, version: config.version }, "server.config");
  await app.listen({ port: config.port, host: config.host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
