export * from './telemetry.js';
export * from './export.js';
