// Core types and enums for the pathway impact engine
export * from './enums.js';
export * from './compounds.js';
export * from './targets.js';
export * from './pathways.js';
export * from './graph.js';
export * from './analysis.js';
export * from './jobs.js';
export * from './api.js';
