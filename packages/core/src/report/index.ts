export { buildReportRows } from './rows.js';
