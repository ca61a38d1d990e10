import demoLedgerJson from "../data/demoLedger.json";
import { LedgerSnapshot } from "../models/Ledger";
import { LedgerSnapshotSchema } from "../utils/validation";

/**
 * Fixed demonstration ledger published when the ledger API is unreachable.
 */
export function loadDemoLedger(): LedgerSnapshot {
  return LedgerSnapshotSchema.parse(demoLedgerJson);
}
