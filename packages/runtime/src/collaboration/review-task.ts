// Peer review task lifecycle
//
//   pending -> in_review -> resolved | conflicted
//   pending -> conflicted            (no reviewer available)

import type { CollaborationTask, CollaborationTaskStatus } from '@huddle/protocol';
import { InvalidTaskTransitionError } from '../errors.js';

const TRANSITIONS: Record<CollaborationTaskStatus, readonly CollaborationTaskStatus[]> = {
  pending: ['in_review', 'conflicted'],
  in_review: ['resolved', 'conflicted'],
  resolved: [],
  conflicted: [],
};

export function canTransition(from: CollaborationTaskStatus, to: CollaborationTaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: CollaborationTaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Move `task` to `to`, returning the updated task.
 *
 * @throws InvalidTaskTransitionError for a change the lifecycle does not allow
 */
export function transitionTask(
  task: CollaborationTask,
  to: CollaborationTaskStatus,
  updatedAt: string,
  changes: Partial<Pick<CollaborationTask, 'reviews' | 'resolution'>> = {}
): CollaborationTask {
  if (!canTransition(task.status, to)) {
    throw new InvalidTaskTransitionError(task.taskId, task.status, to);
  }
  return { ...task, ...changes, status: to, updatedAt };
}
