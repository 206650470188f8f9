export * from './base.js';
export * from './execute.js';
export * from './http.js';
