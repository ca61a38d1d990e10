import express from "express";
import { createRouter } from "./routes";
import { DashboardCache } from "../services/dashboardCache";
import { LedgerClient } from "../services/ledgerClient";
import { loadEnv, warnOnDemoCredentials } from "../config/env";
import { loadAccountGroups } from "../config/accountGroups";

export function createApp(cache: DashboardCache): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(cache));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Ledger Dashboard API",
      version: "1.0.0",
      endpoints: {
        dashboard: "GET /api/dashboard",
        refresh: "POST /api/refresh",
        aggregate: "POST /api/aggregate",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    console.error("Unhandled error:", err);
    if (res.headersSent) {
      return next(err);
    }
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    res.status(status).json({
      error: status === 500 ? "Internal server error" : "Request error",
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

// Start server
if (require.main === module) {
  const env = loadEnv();
  warnOnDemoCredentials(env);

  const client = new LedgerClient({ baseUrl: env.ACTUAL_HTTP_API_URL, apiKey: env.ACTUAL_HTTP_API_KEY });
  const cache = new DashboardCache(client, {
    accountGroups: loadAccountGroups(env.ACCOUNT_GROUPS),
    refreshIntervalMs: env.REFRESH_INTERVAL_MS,
  });

  client.monitorHealth(env.REFRESH_INTERVAL_MS);
  cache.start();

  const app = createApp(cache);
  app.listen(env.PORT, () => {
    console.log(`Server running on port ${env.PORT}`);
    console.log(`API available at http://localhost:${env.PORT}/api`);
  });
}
