import { verifyPartition, MATCH_QUALITY_LABELS } from '@ledger-recon/core';
import type { PipelineStep } from '../types.js';
import { log } from '../../utils/console.js';

/**
 * Step 5: Final Validation
 * Checks that the outcomes partition both inputs and prints the run summary.
 */
export const validateFinal: PipelineStep = async (state) => {
    if (!state.result) {
        state.errors.push({
            step: 'validate',
            message: 'No reconciliation result to validate.',
            fatal: true,
        });
        return state;
    }

    const { outcomes, stats } = state.result;

    // 1. Partition check
    for (const violation of verifyPartition(outcomes, stats.ledger_records, stats.bank_records)) {
        state.errors.push({ step: 'validate', message: violation, fatal: true });
    }

    if (state.reportRows.length !== outcomes.length) {
        state.errors.push({
            step: 'validate',
            message: `Report has ${state.reportRows.length} rows for ${outcomes.length} outcomes.`,
            fatal: true,
        });
    }

    // 2. Summary
    const summary: [string, string | number][] = [
        ['Ledger records', stats.ledger_records],
        ['Bank records', stats.bank_records],
        [MATCH_QUALITY_LABELS.exact_match, stats.exact_matches],
        [MATCH_QUALITY_LABELS.partial_match_fee, stats.fee_matches],
        [MATCH_QUALITY_LABELS.unmatched_bank, stats.unmatched_bank],
        [MATCH_QUALITY_LABELS.unmatched_ledger, stats.unmatched_ledger],
        ['Total fees', stats.total_fees],
    ];
    log(`\n--- Reconciliation Summary ---`);
    for (const [label, value] of summary) {
        log(`${`${label}:`.padEnd(22)}${value}`);
    }

    // 3. Review flags
    const unmatched = stats.unmatched_bank + stats.unmatched_ledger;
    if (unmatched > 0) {
        state.warnings.push(`${unmatched} records could not be matched. (See ${state.settings.report_name})`);
    }

    return state;
};
