import { safeReconcile, buildReportRows } from '@ledger-recon/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Matching
 * Runs the two-pass reconciliation and flattens the outcomes into report rows.
 */
export const matchRecords: PipelineStep = async (state) => {
    // safeReconcile is a core function (pure).
    const reconciled = safeReconcile(state.rows.ledger, state.rows.bank);

    if (!reconciled.success) {
        state.errors.push({
            step: 'match',
            message: reconciled.error.message,
            fatal: true,
            error: reconciled.error,
        });
        return state;
    }

    state.result = reconciled.result;
    state.reportRows = buildReportRows(reconciled.result.outcomes);

    // Forward warnings
    state.warnings.push(...reconciled.result.warnings);

    return state;
};
