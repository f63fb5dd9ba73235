export {
  ConversationMemory,
  RECENT_RESPONSE_LIMIT,
  MAX_PREFERRED_TOPICS,
  type ConversationMemoryOptions,
  type NewTurn,
} from './conversation-memory.js';
export { RingBuffer } from './ring-buffer.js';
export { emptyDigest, foldTurn, assessExpertise, MAX_KEY_INSIGHTS, MAX_INSIGHT_LENGTH } from './digest.js';
export { extractTopics, GENERAL_TOPIC } from './topics.js';
