/**
 * Crawl Module
 *
 * Zone x query crawl with dedup, relevance filtering, classification,
 * scoring and zone-granular checkpointing.
 *
 * @module crawl
 */

export * from './types.js';
export * from './concurrency.js';
export * from './record-store.js';
export * from './record-builder.js';
export * from './checkpoint.js';
export * from './engine.js';
