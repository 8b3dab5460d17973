// Re-export all schemas and types
export * from './jobs.schema';
export * from './job-log.schema';
export * from './job-stats.schema';
export * from './environment.schema';
export * from './inventory.schema';
export * from './config.schema';
export * from './worker.schema';
