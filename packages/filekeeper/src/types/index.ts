export * from './tracked-file.js';
export * from './archive-record.js';
export * from './consolidation.js';
export * from './pattern.js';
