/**
 * Health checker factories
 */

export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export { makeCatalogHealthChecker } from './catalog-checker.js';
