export { parseTransactionFile, parseAmount, findMissingColumns } from './transaction-file.js';
export { inspectFile } from './inspect.js';
export type { FileInspection } from './inspect.js';
