// @huddle/protocol
// Shared data model for the orchestration core: permission levels, agent
// descriptors, requests and responses, context profiles, conversation memory
// and collaboration records.

export * from './types/index.js';
export * from './validation/index.js';
export * from './ndjson/ndjson.js';
