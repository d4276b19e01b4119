import { readFile } from 'node:fs/promises';

/**
 * Read a file into a standalone ArrayBuffer for the core parsers.
 * Node buffers may share a pooled allocation, so the bytes are copied.
 */
export async function readArrayBuffer(filePath: string): Promise<ArrayBuffer> {
    const buffer = await readFile(filePath);
    const arrayBuffer = new ArrayBuffer(buffer.byteLength);
    new Uint8Array(arrayBuffer).set(buffer);
    return arrayBuffer;
}
