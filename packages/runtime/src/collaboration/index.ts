export {
  CollaborationManager,
  DEFAULT_MIN_CONFIDENCE,
  DEFAULT_MAX_RETAINED_TASKS,
  type CollaborationManagerOptions,
  type KnowledgeQuery,
  type PeerReviewOptions,
} from './collaboration-manager.js';
export { canTransition, isTerminal, transitionTask } from './review-task.js';
