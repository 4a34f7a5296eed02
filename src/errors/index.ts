export * from './kiln-error.js';
