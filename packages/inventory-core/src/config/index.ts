export * from './ingest-config';
