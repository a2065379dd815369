export * from './errors.js';
export * from './jsonFileStore.js';
export * from './memoryStore.js';
export type { DocumentStore } from './types.js';
