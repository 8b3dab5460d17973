export * from './job-store.types';
