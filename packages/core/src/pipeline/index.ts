export * from './service-pipeline.js';
