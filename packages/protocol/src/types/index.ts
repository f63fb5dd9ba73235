// Re-export all protocol types

export * from './common.js';
export * from './permissions.js';
export * from './agents.js';
export * from './requests.js';
export * from './context.js';
export * from './memory.js';
export * from './collaboration.js';
