export * from './limits';
export * from './states';
