// Session digest - running summary of every turn in a session
//
// Turns are folded in as they arrive, before they can be evicted from the
// recent-turn buffer, so the digest covers the whole session.

import type { ConversationTurn, ExpertiseLevel, SessionDigest } from '@huddle/protocol';

export const MAX_KEY_INSIGHTS = 5;
export const MAX_INSIGHT_LENGTH = 150;

const INSIGHT_MARKERS = ['important', 'key', 'critical', 'essential'];

export function emptyDigest(): SessionDigest {
  return {
    turnCount: 0,
    topics: [],
    topicCounts: {},
    outcomes: { succeeded: 0, failed: 0 },
    totalTokens: 0,
    roles: [],
    keyInsights: [],
    averageResponseLength: 0,
  };
}

/**
 * Return a new digest that also covers `turn`.
 */
export function foldTurn(digest: SessionDigest, turn: ConversationTurn): SessionDigest {
  const turnCount = digest.turnCount + 1;

  const topics = [...digest.topics];
  const topicCounts = { ...digest.topicCounts };
  for (const topic of turn.topics) {
    if (!(topic in topicCounts)) {
      topics.push(topic);
      topicCounts[topic] = 0;
    }
    topicCounts[topic] += 1;
  }

  const keyInsights = [...digest.keyInsights];
  if (keyInsights.length < MAX_KEY_INSIGHTS && isInsight(turn.response)) {
    keyInsights.push(clipInsight(turn.response));
  }

  return {
    turnCount,
    topics,
    topicCounts,
    outcomes: {
      succeeded: digest.outcomes.succeeded + (turn.success ? 1 : 0),
      failed: digest.outcomes.failed + (turn.success ? 0 : 1),
    },
    totalTokens: digest.totalTokens + turn.tokensUsed,
    roles: [...digest.roles, turn.role],
    keyInsights,
    averageResponseLength:
      digest.averageResponseLength + (turn.response.length - digest.averageResponseLength) / turnCount,
  };
}

function isInsight(response: string): boolean {
  const lower = response.toLowerCase();
  return INSIGHT_MARKERS.some((marker) => lower.includes(marker));
}

function clipInsight(response: string): string {
  return response.length > MAX_INSIGHT_LENGTH
    ? `${response.slice(0, MAX_INSIGHT_LENGTH - 3)}...`
    : response;
}

/**
 * Expertise inferred from the roles a user has been served under.
 *
 * Fewer than three turns is too little to judge (beginner). Otherwise the
 * share of data_scientist turns decides: half or more is advanced, a
 * fifth or more is intermediate. Production-only users who keep coming
 * back (five sessions or more) count as intermediate.
 */
export function assessExpertise(roles: string[], sessionCount: number): ExpertiseLevel {
  if (roles.length < 3) return 'beginner';

  const scientistShare = roles.filter((r) => r === 'data_scientist').length / roles.length;
  if (scientistShare >= 0.5) return 'advanced';
  if (scientistShare >= 0.2 || sessionCount >= 5) return 'intermediate';
  return 'beginner';
}
