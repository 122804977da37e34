export * from './catalog.js';
export * from './config-schemas.js';
export * from './base.js';
export * from './documents.js';
export * from './vector-index.js';
export * from './pdf-loader.js';
export * from './text-splitter.js';
export * from './embeddings.js';
export * from './vector-store.js';
export * from './qa-chain.js';
export * from './web-search.js';
export * from './factory.js';
