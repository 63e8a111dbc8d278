import { serve } from "@hono/node-server";
import env from "./utils/env-vars";
import { logger } from "./utils/logger";
import { migrate, openDatabase } from "./db/database";
import { createRepositories } from "./repositories";
import { createServices } from "./services";
import { getStorageService } from "./services/storage";
import { createApp } from "./app";

const db = openDatabase(env.DATABASE_FILE);
migrate(db);

const services = createServices(createRepositories(db), getStorageService());

const app = createApp({
  services,
  maxFileSize: env.MAX_FILE_SIZE,
  auth:
    env.APP_API_KEY && env.APP_API_SECRET
      ? {
          username: env.APP_API_KEY,
          password: env.APP_API_SECRET,
          frontendUrl: env.APP_FRONTEND_URL,
        }
      : undefined,
  staticRoot: "./public",
});

const server = serve({ fetch: app.fetch, port: env.APP_PORT }, (info) => {
  logger.info(`Listening on http://localhost:${info.port}`);
});

const shutdown = () => {
  server.close();
  db.close();
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
