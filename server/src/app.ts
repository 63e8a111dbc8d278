import { Hono, type Context, type Next } from "hono";
import { basicAuth } from "hono/basic-auth";
import { cors } from "hono/cors";
import { logger as requestLogger } from "hono/logger";
import { serveStatic } from "@hono/node-server/serve-static";
import type { Services } from "./services";
import { budgetRoutes } from "./routes/budgets";
import { categoryRoutes, categoryRuleRoutes } from "./routes/categories";
import { expenseRoutes } from "./routes/expenses";
import { incomeRoutes } from "./routes/incomes";
import { receiptRoutes } from "./routes/receipts";
import { summaryRoutes } from "./routes/summary";
import { logger } from "./utils/logger";

export type AppOptions = {
  services: Services;
  maxFileSize: number;
  auth?: {
    username: string;
    password: string;
    frontendUrl?: string;
  };
  // Directory holding the built client; omitted in tests
  staticRoot?: string;
};

const apiAuth = (auth: NonNullable<AppOptions["auth"]>) => {
  const checkCredentials = basicAuth({
    username: auth.username,
    password: auth.password,
  });

  return async (c: Context, next: Next) => {
    const allowed = auth.frontendUrl;
    const origin = c.req.header("origin") || "";
    const referer = c.req.header("referer") || "";

    if (allowed && (origin.startsWith(allowed) || referer.startsWith(allowed))) {
      await next();
      return;
    }

    return checkCredentials(c, next);
  };
};

export function createApp({ services, maxFileSize, auth, staticRoot }: AppOptions) {
  const app = new Hono();

  app.use(requestLogger((message, ...rest) => logger.info(message, ...rest)));
  app.use("/api/*", cors());
  if (auth) {
    app.use("/api/*", apiAuth(auth));
  }

  app.route("/api/expenses", expenseRoutes(services));
  app.route("/api/incomes", incomeRoutes(services));
  app.route("/api/budgets", budgetRoutes(services));
  app.route("/api/categories", categoryRoutes(services));
  app.route("/api/category-rules", categoryRuleRoutes(services));
  app.route("/api/receipts", receiptRoutes(services, maxFileSize));
  app.route("/api/summary", summaryRoutes(services));

  app.get("/healthz", async (c) => {
    return c.text("OK", 200);
  });

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  // Serve the front-end from the public directory
  if (staticRoot) {
    app.use("/*", serveStatic({ root: staticRoot }));
    app.get("/*", serveStatic({ root: staticRoot, path: "index.html" }));
  }

  return app;
}
