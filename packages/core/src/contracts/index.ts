export * from './sections.js';
export * from './errorContext.js';
