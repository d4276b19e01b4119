/**
 * Record ID generation and collision handling.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 so core stays free of node:crypto.
 */

import { sha256 } from 'js-sha256';
import type { Decimal } from 'decimal.js';
import type { Origin } from '../types/index.js';
import { RECORD_ID } from '../types/index.js';

/**
 * Generate deterministic record ID via SHA-256 hash.
 *
 * Payload format: "{origin}|{date}|{description}|{signed_amount}"
 * The amount is written without trailing zeros, so "500.00" and "500"
 * hash alike.
 *
 * @returns 16-character hex record ID
 */
export function generateRecordId(
    origin: Origin,
    date: string,
    description: string,
    signedAmount: Decimal
): string {
    const payload = `${origin}|${date}|${description}|${signedAmount.toFixed()}`;
    return sha256(payload).slice(0, RECORD_ID.LENGTH);
}

/**
 * Resolve collisions by adding deterministic suffixes.
 * Identical rows in one source get -02, -03, ..., -100 in input order.
 *
 * PURE FUNCTION: Returns new array with updated IDs. Does not mutate input.
 */
export function resolveCollisions<T extends { record_id: string }>(records: readonly T[]): T[] {
    const seen: Record<string, number> = {};
    const result: T[] = [];

    for (const record of records) {
        const baseId = record.record_id;

        if (seen[baseId]) {
            seen[baseId] += 1;

            // At least two digits; the 100th copy gets -100
            const suffix = String(seen[baseId]).padStart(2, '0');
            result.push({ ...record, record_id: `${baseId}-${suffix}` });
        } else {
            seen[baseId] = 1;
            result.push({ ...record });
        }
    }

    return result;
}

/**
 * Map of base ID -> count for IDs that collided (count > 1).
 */
export function buildCollisionMap(records: readonly { record_id: string }[]): Record<string, number> {
    const counts: Record<string, number> = {};

    for (const record of records) {
        const baseId = record.record_id.substring(0, RECORD_ID.LENGTH);
        counts[baseId] = (counts[baseId] || 0) + 1;
    }

    const collisionMap: Record<string, number> = {};
    for (const [id, count] of Object.entries(counts)) {
        if (count > 1) {
            collisionMap[id] = count;
        }
    }

    return collisionMap;
}
