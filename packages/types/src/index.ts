export * from './auth.schema.js';
export * from './item.schema.js';
