export { createPgRepositoryContext } from './context.js';
export {
  PgSessionSummaryRepository,
  summaryToRow,
  rowToSessionSummary,
} from './session-summary-repository.js';
export { PgKnowledgeRepository, knowledgeItemToRow, rowToKnowledgeItem } from './knowledge-repository.js';
