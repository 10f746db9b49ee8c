export * from './dates.js';
export * from './pattern-validation.js';
export * from './recurrence.js';
export * from './rotation.js';
export * from './assignment-resolver.js';
export * from './exception-overlay.js';
export * from './exception-workflow.js';
export * from './planned-downtime.js';
export * from './composer.js';
export * from './statistics.js';
