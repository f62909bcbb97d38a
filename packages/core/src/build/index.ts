export * from './image-builder.js';
export * from './types.js';
