export * from './env-credential-provider.js';
