export * from './node.js';
export * from './graph.js';
export * from './execution.js';
