export * from './stores/memory-job-store';
export * from './factories/job.factory';
export * from './helpers/wait.helper';
export * from './helpers/fs.helper';
