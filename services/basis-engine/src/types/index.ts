/**
 * Basis Engine
 * Core Type Definitions
 */

export * from './market.js';
export * from './signals.js';
export * from './orders.js';
export * from './position.js';
