export type { IMobileOptions } from './IMobileOptions.js';
export type { IMobileRequestSignals, MobileDecision } from './IMobileRequestSignals.js';
export type { IMobileStatus } from './IMobileStatus.js';
export type { MobileOverride } from './MobileOverride.js';
