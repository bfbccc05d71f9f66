export { createClient } from './api/client.js';
export type { QualtricsClient } from './api/client.js';
export * from './api/errors.js';
export * from './api/outcome.js';
export * from './api/types.js';
export { CONTACT_HEADERS, contactColumns, parseCsv, toCsv } from './api/csv.js';
export type { ColumnIndexes, ContactColumn, CsvRow } from './api/csv.js';
export type { EmbeddedData, Passthrough } from './api/params.js';
export { exportFormats } from './api/schemas/index.js';
export { isZipArchive } from './api/operations/exports.js';
export { ConfigError, DEFAULT_API_VERSION, DEFAULT_BASE_URL, defineConfig, loadConfig } from './config.js';
export type { ConfigInput, QualtricsConfig } from './config.js';
export { advanceExport, downloadResponseExportFile, isTerminal, pollExport, requested } from './workflows/exports.js';
export type { ExportState } from './workflows/exports.js';
export { truncateContactList } from './workflows/contacts.js';
export type { TruncateReport } from './workflows/contacts.js';
export { generateUniqueSurveyLink } from './workflows/links.js';
export type { UniqueLinkParams } from './workflows/links.js';
export { MockQualtrics } from './mock/index.js';
export type { MockCall, MockOptions, MockSeed } from './mock/index.js';
