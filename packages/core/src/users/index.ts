/**
 * Users Domain
 */

export { DrizzleAccountStore } from './user-repository.js';
