/**
 * @commerce/core - Domain logic for the commerce API
 *
 * Postgres-backed account store and the item catalog service. Route handlers
 * in the API layer consume these; nothing here knows about HTTP.
 */

export * from './users/index.js';
export * from './items/index.js';
