import type { MatchOutcome, ReportRow } from '../types/index.js';
import { MATCH_QUALITY_LABELS } from '../types/index.js';

/**
 * Flatten outcomes into report rows, one per outcome, in outcome order.
 * Amounts are the records' signed amounts as supplied; absent sides are null.
 */
export function buildReportRows(outcomes: readonly MatchOutcome[]): ReportRow[] {
    return outcomes.map(outcome => ({
        Match_Quality: MATCH_QUALITY_LABELS[outcome.quality],
        Bank_Date: outcome.bank_record?.date ?? null,
        Bank_Desc: outcome.bank_record?.description ?? null,
        Bank_Amt: outcome.bank_record?.signed_amount ?? null,
        Ledger_Date: outcome.ledger_record?.date ?? null,
        Ledger_Desc: outcome.ledger_record?.description ?? null,
        Ledger_Amt: outcome.ledger_record?.signed_amount ?? null,
        Difference: outcome.difference ?? null,
    }));
}
