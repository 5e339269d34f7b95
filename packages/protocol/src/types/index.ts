// Re-export all protocol types

export * from './coefficients.js';
export * from './emissivity.js';
