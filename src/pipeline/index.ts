/**
 * Pipeline exports.
 */

export * from './atomic-file';
export * from './cache-gate';
export * from './extractor';
export * from './fetcher';
export * from './payload-cache';
export * from './radar-pipeline';
export * from './single-flight';
export * from './transformer';
