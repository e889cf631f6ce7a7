export * from './schema/index.js';
export { createDatabase, pingDatabase } from './client.js';
export type { CreateDatabaseOptions, Database, DatabaseHandle } from './client.js';
export { isUniqueViolation, uniqueViolationConstraint } from './errors.js';
