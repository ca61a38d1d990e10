import * as fs from "fs";
import * as path from "path";
import { aggregateLedger } from "./src/engine/aggregator";
import { buildDashboardSummary } from "./src/engine/summary";
import { DEFAULT_ACCOUNT_GROUPS } from "./src/utils/constants";
import { AccountGroupConfigSchema, LedgerSnapshotSchema, formatIssues } from "./src/utils/validation";

/**
 * Aggregate a ledger snapshot file and write the result as JSON.
 * Usage: npx ts-node run-aggregation.ts [input-file] [output-file]
 * Input: { accounts, categories, transactions, payees?, accountGroups? }
 * Default output: aggregation-output.json
 */
const inputPath = process.argv[2] ?? "ledger.json";
const outputPath = process.argv[3] ?? "aggregation-output.json";

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

const ledger = LedgerSnapshotSchema.safeParse(inputData);
if (!ledger.success) {
  console.error(`Input file is not a valid ledger snapshot: ${formatIssues(ledger.error).join("; ")}`);
  process.exit(1);
}

const rawGroups =
  inputData && typeof inputData === "object" && "accountGroups" in inputData
    ? inputData.accountGroups
    : DEFAULT_ACCOUNT_GROUPS;
const accountGroups = AccountGroupConfigSchema.safeParse(rawGroups);
if (!accountGroups.success) {
  console.error(`Invalid accountGroups: ${formatIssues(accountGroups.error).join("; ")}`);
  process.exit(1);
}

const aggregate = aggregateLedger(ledger.data, accountGroups.data);
const summary = buildDashboardSummary(aggregate, accountGroups.data);

fs.writeFileSync(path.resolve(outputPath), JSON.stringify({ aggregate, summary }, null, 2));

console.log(`Aggregated ${aggregate.diagnostics.transactionCount} transactions into ${Object.keys(aggregate.netWorthByMonth).length} months`);
if (aggregate.diagnostics.dateFallbackCount > 0) {
  console.warn(`${aggregate.diagnostics.dateFallbackCount} transaction(s) had unreadable dates and were bucketed into the current month`);
}
console.log(`Written to ${outputPath}`);
