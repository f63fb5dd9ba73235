export * from './sessions.js';
export * from './knowledge.js';
