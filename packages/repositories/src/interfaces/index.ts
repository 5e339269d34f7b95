// Provider interfaces
// These define the contracts for reference data access.

export type { CoefficientProvider } from './coefficient-provider.js';
export type { EmissivityProvider } from './emissivity-provider.js';
