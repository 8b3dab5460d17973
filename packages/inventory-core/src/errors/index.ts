export * from './base.error';
export * from './validation.error';
export * from './input-decode.error';
export * from './source-missing.error';
export * from './export-write.error';
export * from './relocation.error';
export * from './job.error';
export * from './config.error';
