export * from './logger';
export * from './job-events';
