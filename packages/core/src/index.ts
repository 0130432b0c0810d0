export * from './schemas.js';
export * from './errors.js';
export * from './viability.js';
export * from './assessment/types.js';
