import { z } from "zod";
import { Account, Category, LedgerSnapshot, Payee, Transaction } from "../models/Ledger";
import {
  AccountSchema,
  CategorySchema,
  PayeeSchema,
  TransactionSchema,
  formatIssues,
} from "../utils/validation";

/**
 * Anything that can produce a full ledger snapshot.
 */
export interface LedgerSource {
  fetchSnapshot(): Promise<LedgerSnapshot>;
}

export interface LedgerClientOptions {
  baseUrl: string;
  apiKey: string;
  fetchImpl?: typeof fetch;
}

export type TransactionQuery = Record<string, string | number | boolean | null | undefined>;

/**
 * Raised for non-2xx responses and for payloads that fail validation.
 * `status` is null when the response was 2xx but unusable.
 */
export class LedgerApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly body: unknown
  ) {
    super(message);
    this.name = "LedgerApiError";
  }
}

const DetailsSchema = z.record(z.string(), z.unknown());

/**
 * Builds a query string, dropping null and undefined values.
 */
export function buildQueryString(query: TransactionQuery = {}): string {
  return Object.entries(query)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== null && entry[1] !== undefined)
    .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
    .join("&");
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Accepts either a bare list or a `{ data: [...] }` envelope.
 */
function listPayload<T extends z.ZodTypeAny>(itemSchema: T) {
  return z.union([
    z.array(itemSchema),
    z.object({ data: z.array(itemSchema) }).transform((payload) => payload.data),
  ]);
}

/**
 * Client for the budgeting app's HTTP API.
 */
export class LedgerClient implements LedgerSource {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: LedgerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async getAccounts(): Promise<Account[]> {
    return this.getValidated("/accounts", listPayload(AccountSchema));
  }

  async getCategories(): Promise<Category[]> {
    return this.getValidated("/categories", listPayload(CategorySchema));
  }

  async getPayees(): Promise<Payee[]> {
    return this.getValidated("/payees", listPayload(PayeeSchema));
  }

  async getTransactions(query: TransactionQuery = {}): Promise<Transaction[]> {
    const params = buildQueryString(query);
    const endpoint = params === "" ? "/transactions" : `/transactions?${params}`;
    return this.getValidated(endpoint, listPayload(TransactionSchema));
  }

  async getAllTransactions(): Promise<Transaction[]> {
    return this.getTransactions();
  }

  /**
   * Budget figures for one month ("YYYY-MM"), passed through as returned.
   */
  async getBudgetMonth(month: string): Promise<Record<string, unknown>> {
    return this.getValidated(`/budget/${encodeURIComponent(month)}`, DetailsSchema);
  }

  async getNetWorth(): Promise<Record<string, unknown>> {
    return this.getValidated("/net-worth", DetailsSchema);
  }

  /**
   * Pulls accounts, categories, payees and transactions.
   */
  async fetchSnapshot(): Promise<LedgerSnapshot> {
    const [accounts, categories, payees, transactions] = await Promise.all([
      this.getAccounts(),
      this.getCategories(),
      this.getPayees(),
      this.getAllTransactions(),
    ]);
    return { accounts, categories, payees, transactions };
  }

  /**
   * Probes `/health`. Failures are logged and reported as false.
   */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/health`, { headers: this.headers() });
      if (response.ok) {
        console.log("[ledger-client] Ledger API is healthy");
        return true;
      }
      console.warn(`[ledger-client] Health check returned status: ${response.status}`);
      return false;
    } catch (error) {
      console.warn(`[ledger-client] Health check failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  /**
   * Probes health now and again every `intervalMs`. Returns a function that stops the schedule.
   */
  monitorHealth(intervalMs: number): () => void {
    const probe = () => {
      this.checkHealth().catch((error: unknown) => console.error("[ledger-client] Health check error:", error));
    };
    probe();
    const timer = setInterval(probe, intervalMs);
    return () => clearInterval(timer);
  }

  private headers(): Record<string, string> {
    return {
      authorization: `Bearer ${this.apiKey}`,
      "content-type": "application/json",
    };
  }

  private async get(endpoint: string): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, { headers: this.headers() });
    const body = await readBody(response);
    if (!response.ok) {
      console.warn(`[ledger-client] API request failed: ${response.status} ${endpoint}`);
      throw new LedgerApiError(`GET ${endpoint} failed with status ${response.status}`, response.status, body);
    }
    return body;
  }

  private async getValidated<T extends z.ZodTypeAny>(endpoint: string, schema: T): Promise<z.output<T>> {
    const body = await this.get(endpoint);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new LedgerApiError(
        `GET ${endpoint} returned an invalid payload: ${formatIssues(parsed.error).join("; ")}`,
        null,
        body
      );
    }
    return parsed.data;
  }
}
