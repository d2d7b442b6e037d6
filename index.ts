export * from './parser/index.js';
export * from './renderer/index.js';
