export * from './domain/turbineParts.js';
export * from './domain/lifecycleErrors.js';
export * from './store/collections.js';
export * from './store/dto.js';
