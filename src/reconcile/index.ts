/**
 * Reconcile Module
 *
 * @module reconcile
 */

export * from './reconciler.js';
