/**
 * Documents Module
 */

export * from './types.js';

export { buildPageContent, mapRowToDocument, mapRows } from './mapper.js';
