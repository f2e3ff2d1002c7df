/**
 * Breezeway Engine — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types and errors
export * from './types';
export * from './errors';

// Points
export * from './points';

// Provider access and aggregation
export * from './ingest/fetcher';
export * from './ingest/pipeline';
export * from './ranking';

// Ranked cache
export * from './cache';

// Travel advisory
export * from './advisory';
