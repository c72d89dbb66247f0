export { RecordsClient, RecordsApiError, formulaString } from './api';
export type { ConnectionCheck, FieldValue, RecordFields, RemoteRecord, UpsertResult, RecordsClientOptions } from './api';
export { resolveApiKey, resolveApiUrl, resolveBaseId, resolveTable, DEFAULT_API_URL, DEFAULT_TABLE } from './auth';
export { loadRecordsConfig } from './config';
export type { RecordsConfig } from './config';
