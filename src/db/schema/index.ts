export * from './enums.js';
export * from './users.js';
export * from './jobs.js';
export * from './usage-events.js';
export * from './history.js';
export * from './module-configs.js';
export * from './reference-data.js';
export * from './migrations.js';
