export * from './types.js';
export * from './errors.js';
export * from './membership.js';
export * from './validation.js';
export * from './fuzzy-controller.js';
export * from './vehicle-dynamics.js';
export * from './track.js';
export * from './analysis.js';
export * from './simulation.js';
