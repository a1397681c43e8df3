/**
 * Main types export file for the yield advisor
 */

// Core types
export * from './core';

// Weather types
export * from './weather';

// Agronomy types
export * from './agronomy';

// Prediction types
export * from './prediction';

// Recommendation types
export * from './recommendation';
