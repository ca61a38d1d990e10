import { AccountGroupConfig } from "../models/AccountGroups";
import { LedgerAggregate } from "../models/Aggregates";
import { LedgerSnapshot } from "../models/Ledger";
import { aggregateLedger } from "../engine/aggregator";
import { DashboardSummary, buildDashboardSummary } from "../engine/summary";
import { DEFAULT_REFRESH_INTERVAL_MS } from "../utils/constants";
import { deepFreeze } from "../utils/immutability";
import { currentUtcDate } from "../utils/time";
import { LedgerSource } from "./ledgerClient";
import { loadDemoLedger } from "./demoLedger";

export type SnapshotOrigin = "api" | "demo" | "empty";

/**
 * Everything the dashboard reads, published as one frozen value.
 */
export interface DashboardSnapshot extends LedgerSnapshot {
  aggregate: LedgerAggregate;
  summary: DashboardSummary;
  accountGroups: AccountGroupConfig;
  origin: SnapshotOrigin;
  lastUpdated: string | null;
}

export interface DashboardCacheOptions {
  accountGroups: AccountGroupConfig;
  refreshIntervalMs?: number;
  now?: () => Date;
  demoLedger?: () => LedgerSnapshot;
}

const EMPTY_LEDGER: LedgerSnapshot = { accounts: [], categories: [], payees: [], transactions: [] };

/**
 * Holds the latest dashboard snapshot and refreshes it from a ledger source.
 *
 * A refresh fetches the ledger, aggregates it and swaps the snapshot in a single
 * assignment, so readers see either the previous snapshot or the new one.
 * Overlapping refresh requests share one in-flight pass. When the fetch fails,
 * the demo ledger is aggregated and published instead.
 */
export class DashboardCache {
  private snapshot: DashboardSnapshot;
  private inFlight: Promise<DashboardSnapshot> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly accountGroups: AccountGroupConfig;
  private readonly refreshIntervalMs: number;
  private readonly now: () => Date;
  private readonly demoLedger: () => LedgerSnapshot;

  constructor(
    private readonly source: LedgerSource,
    options: DashboardCacheOptions
  ) {
    this.accountGroups = deepFreeze(structuredClone(options.accountGroups));
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
    this.demoLedger = options.demoLedger ?? loadDemoLedger;
    this.snapshot = this.buildSnapshot(EMPTY_LEDGER, "empty", null);
  }

  getSnapshot(): DashboardSnapshot {
    return this.snapshot;
  }

  getLastUpdated(): string | null {
    return this.snapshot.lastUpdated;
  }

  isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Refreshes the snapshot; joins the running refresh if there is one.
   */
  refresh(): Promise<DashboardSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Fire-and-forget refresh for timers and manual triggers; failures are logged.
   */
  requestRefresh(): void {
    this.refresh().catch((error: unknown) => {
      console.error("[dashboard-cache] Refresh failed:", error);
    });
  }

  /**
   * Loads immediately, then refreshes on the configured interval.
   */
  start(): void {
    if (this.timer) {
      return;
    }
    this.requestRefresh();
    this.timer = setInterval(() => this.requestRefresh(), this.refreshIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async load(): Promise<DashboardSnapshot> {
    console.log("[dashboard-cache] Loading financial data from ledger API...");

    let ledger: LedgerSnapshot;
    let origin: SnapshotOrigin;
    try {
      ledger = await this.source.fetchSnapshot();
      origin = "api";
      console.log(
        `[dashboard-cache] Loaded ${ledger.accounts.length} accounts, ${ledger.categories.length} categories, ${ledger.transactions.length} transactions`
      );
    } catch (error) {
      console.warn(
        `[dashboard-cache] Failed to load data from API, using demo data: ${error instanceof Error ? error.message : String(error)}`
      );
      ledger = this.demoLedger();
      origin = "demo";
    }

    const next = this.buildSnapshot(ledger, origin, this.now().toISOString());
    this.snapshot = next;
    console.log(`[dashboard-cache] Data processing completed (${origin})`);
    return next;
  }

  private buildSnapshot(
    ledger: LedgerSnapshot,
    origin: SnapshotOrigin,
    lastUpdated: string | null
  ): DashboardSnapshot {
    const aggregate = aggregateLedger(ledger, this.accountGroups, {
      today: currentUtcDate(this.now()),
    });
    return deepFreeze({
      accounts: ledger.accounts,
      categories: ledger.categories,
      payees: ledger.payees,
      transactions: ledger.transactions,
      aggregate,
      summary: buildDashboardSummary(aggregate, this.accountGroups),
      accountGroups: this.accountGroups,
      origin,
      lastUpdated,
    });
  }
}
