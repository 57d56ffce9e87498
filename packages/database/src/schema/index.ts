export * from './part-revisions.js';
export * from './parts.js';
