// Core Types
export * from './types/index.js';

// Utilities
export * from './utils/index.js';
