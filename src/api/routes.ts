import { Router, Request, Response } from "express";
import { aggregateLedger } from "../engine/aggregator";
import { buildDashboardSummary } from "../engine/summary";
import { DashboardCache } from "../services/dashboardCache";
import { AggregateRequestSchema, formatIssues } from "../utils/validation";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Routes serving the cached dashboard aggregates.
 */
export function createRouter(cache: DashboardCache): Router {
  const router = Router();

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Ledger Dashboard API",
      version: "1.0.0",
      endpoints: {
        dashboard: "GET /api/dashboard - Aggregates, summary and account groups from the latest snapshot",
        netWorth: "GET /api/net-worth - Cumulative balance per account group by month",
        cashFlow: "GET /api/cash-flow - Income, expenses and net by month",
        metrics: "GET /api/metrics - Savings rate, withdrawal rate and savings multiple, most recent first",
        refresh: "POST /api/refresh - Reload the ledger and recompute",
        aggregate: "POST /api/aggregate - Aggregate a ledger supplied in the request body",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  router.get("/dashboard", (req: Request, res: Response) => {
    const snapshot = cache.getSnapshot();
    res.json({
      origin: snapshot.origin,
      lastUpdated: snapshot.lastUpdated,
      accountGroups: snapshot.accountGroups,
      aggregate: snapshot.aggregate,
      summary: snapshot.summary,
    });
  });

  router.get("/net-worth", (req: Request, res: Response) => {
    res.json(cache.getSnapshot().aggregate.netWorthByMonth);
  });

  router.get("/cash-flow", (req: Request, res: Response) => {
    res.json(cache.getSnapshot().aggregate.cashFlowByMonth);
  });

  router.get("/metrics", (req: Request, res: Response) => {
    res.json(cache.getSnapshot().aggregate.metrics);
  });

  /**
   * POST /api/refresh
   * Starts a refresh and returns without waiting for it
   */
  router.post("/refresh", (req: Request, res: Response) => {
    cache.requestRefresh();
    res.status(202).json({ status: "refreshing" });
  });

  /**
   * POST /api/aggregate
   * Stateless aggregation of the ledger in the body; the cache is not touched
   */
  router.post("/aggregate", (req: Request, res: Response) => {
    const parsed = AggregateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: "Invalid aggregation request",
        issues: formatIssues(parsed.error),
      });
    }

    try {
      const { accountGroups, ...ledger } = parsed.data;
      const aggregate = aggregateLedger(ledger, accountGroups);
      res.json({ aggregate, summary: buildDashboardSummary(aggregate, accountGroups) });
    } catch (error: unknown) {
      console.error("Error in aggregation:", error);
      res.status(500).json({
        error: "Internal server error",
        message: errorMessage(error),
      });
    }
  });

  return router;
}
