export * from './schema.js';
export * from './model.js';
export * from './interpolate.js';
export * from './validator.js';
export * from './loader.js';
