// Synthesis - merge subtask results into one response body
//
// Results are grouped by result key. Within a group equal values merge
// silently; otherwise the higher confidence wins, then the higher agent
// permission. A group with no single winner is reported as a conflict and
// left out of the merged result.

import { isDeepStrictEqual } from 'node:util';
import type { Id, PermissionLevel, ResultConflict } from '@huddle/protocol';
import { comparePermissionLevels } from '../access/permissions.js';

/**
 * A subtask that produced a result
 */
export type SubtaskResult = {
  subtaskId: string;
  resultKey: string;
  agentId: Id;
  agentPermission: PermissionLevel;
  result: unknown;

  /** Set when peer review did not approve the result */
  reviewConflict?: string;
};

export type Synthesis = {
  /** Result values by key, in plan order */
  merged: Map<string, unknown>;
  conflicts: ResultConflict[];
};

export function synthesize(results: SubtaskResult[]): Synthesis {
  const groups = new Map<string, SubtaskResult[]>();
  for (const result of results) {
    groups.set(result.resultKey, [...(groups.get(result.resultKey) ?? []), result]);
  }

  const merged = new Map<string, unknown>();
  const conflicts: ResultConflict[] = [];

  for (const [resultKey, group] of groups) {
    const outcome = mergeGroup(resultKey, group);
    if (outcome.conflict) {
      conflicts.push(outcome.conflict);
    } else {
      merged.set(resultKey, outcome.value);
    }

    for (const reviewed of group) {
      if (reviewed.reviewConflict === undefined) continue;
      conflicts.push({
        resultKey,
        candidates: [toCandidate(reviewed)],
        reason: `peer review did not approve: ${reviewed.reviewConflict}`,
      });
    }
  }

  return { merged, conflicts };
}

function mergeGroup(
  resultKey: string,
  group: SubtaskResult[]
): { value: unknown; conflict?: undefined } | { value?: undefined; conflict: ResultConflict } {
  const [first, ...rest] = group;
  if (rest.every((r) => isDeepStrictEqual(r.result, first.result))) {
    return { value: first.result };
  }

  const ranked = [...group].sort(compareResults);
  const [best, runnerUp] = ranked;
  if (compareResults(best, runnerUp) < 0) {
    return { value: best.result };
  }

  const tied = ranked.filter((r) => compareResults(r, best) === 0);
  return {
    conflict: {
      resultKey,
      candidates: tied.map(toCandidate),
      reason: 'results differ with equal confidence and agent permission',
    },
  };
}

/**
 * Better results sort first
 */
function compareResults(a: SubtaskResult, b: SubtaskResult): number {
  const confidence = (confidenceOf(b.result) ?? -1) - (confidenceOf(a.result) ?? -1);
  if (confidence !== 0) return confidence;
  return comparePermissionLevels(b.agentPermission, a.agentPermission);
}

function toCandidate(result: SubtaskResult): ResultConflict['candidates'][number] {
  return {
    subtaskId: result.subtaskId,
    agentId: result.agentId,
    result: result.result,
    confidence: confidenceOf(result.result),
  };
}

/**
 * `confidence` of an object result when it is a number in [0, 1]
 */
export function confidenceOf(result: unknown): number | undefined {
  if (typeof result !== 'object' || result === null) return undefined;
  const confidence: unknown = Reflect.get(result, 'confidence');
  return typeof confidence === 'number' && confidence >= 0 && confidence <= 1 ? confidence : undefined;
}
