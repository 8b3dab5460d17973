// Schemas and types
export * from './schemas';
export * from './types';

// Errors
export * from './errors';

// Logger
export * from './logger';

// Configuration
export * from './config';

// Utils
export * from './utils';

// Constants
export * from './constants';
