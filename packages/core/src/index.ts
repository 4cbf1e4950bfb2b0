/**
 * @tally/core - Domain logic for the Tally ledger
 *
 * Ingestion (extraction, normalization), append-only storage and
 * aggregation. Everything here is transport-agnostic and consumed by the
 * API layer.
 */

export * from './taxonomy/index.js';
export * from './extraction/index.js';
export * from './normalization/index.js';
export * from './ledger/index.js';
export * from './aggregation/index.js';
export * from './events/index.js';
export * from './service/index.js';
