import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

const HASH_PREFIX = 'sha256:';

/**
 * SHA-256 of raw bytes, prefixed with 'sha256:' as recorded in the run manifest.
 */
export function hashContent(content: Uint8Array): string {
    return HASH_PREFIX + createHash('sha256').update(content).digest('hex');
}

/**
 * Hash of a file's content. Rejects when the path cannot be read as a file.
 */
export async function hashFile(filePath: string): Promise<string> {
    return hashContent(await readFile(filePath));
}
