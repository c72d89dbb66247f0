export * from './types.js';
export * from './stages.js';
export * from './fields.js';
export * from './dates.js';
export * from './identity.js';
export * from './registry.js';
export * from './report.js';
export * from './edits.js';
export * from './errors.js';
export * from './logger.js';
export * from './ingest/index.js';
export * from './pipeline.js';
export * from './config.js';
export * from './sources.js';
export * from './store.js';
export * from './sync.js';
export * from './desk.js';
export * from './analytics.js';
export * from './templates.js';
export * from './session.js';
