// Quality assurance - result checks and peer review

import type { Params } from '@huddle/protocol';
import { BaseAgent } from '../base-agent.js';
import type { AgentDefinition, ReviewContext, ReviewDecision } from '../types.js';

export const QUALITY_ASSURANCE_TYPE = 'quality_assurance';
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

const EMPTY_RESULT = 'result is empty';

export type QualityIssue = {
  severity: 'error' | 'warning';
  message: string;
};

export class QualityAssuranceAgent extends BaseAgent {
  constructor(
    agentId: string,
    private readonly threshold = DEFAULT_CONFIDENCE_THRESHOLD
  ) {
    super({
      agentType: QUALITY_ASSURANCE_TYPE,
      agentId,
      name: 'Quality Assurance',
      permissionLevel: 'read_execute',
      expertiseDomains: ['quality', 'review'],
      capabilities: [
        {
          name: 'validate_result',
          description: 'Check a result for emptiness, errors and low confidence',
          requiredPermission: 'read_execute',
          executionTimeEstimateMs: 300,
          domainTags: ['quality'],
          handler: async (params: Params) => {
            const issues = inspectResult(params.result, threshold);
            return {
              valid: !issues.some((i) => i.severity === 'error'),
              issues,
              confidence: 0.9,
            };
          },
        },
      ],
    });
  }

  /**
   * Reject low confidence, ask for a revision when there is nothing to
   * review, otherwise approve.
   */
  async review(payload: unknown, ctx: ReviewContext): Promise<ReviewDecision> {
    const issues = inspectResult(payload, this.threshold);
    const decision = decide(issues);
    ctx.logger.debug('Reviewed result', { verdict: decision.verdict, issues: issues.length });
    return decision;
  }
}

function decide(issues: QualityIssue[]): ReviewDecision {
  const empty = issues.find((i) => i.message === EMPTY_RESULT);
  if (empty) return { verdict: 'revise', comments: empty.message };

  const errors = issues.filter((i) => i.severity === 'error');
  if (errors.length > 0) {
    return { verdict: 'reject', comments: errors.map((i) => i.message).join('; ') };
  }
  return { verdict: 'approve' };
}

export function inspectResult(result: unknown, threshold = DEFAULT_CONFIDENCE_THRESHOLD): QualityIssue[] {
  if (isEmpty(result)) {
    return [{ severity: 'error', message: EMPTY_RESULT }];
  }

  const issues: QualityIssue[] = [];
  if (typeof result !== 'object' || result === null) return issues;

  const confidence: unknown = Reflect.get(result, 'confidence');
  if (confidence === undefined) {
    issues.push({ severity: 'warning', message: 'result carries no confidence' });
  } else if (typeof confidence !== 'number' || confidence < 0 || confidence > 1) {
    issues.push({ severity: 'error', message: 'confidence must be a number in [0, 1]' });
  } else if (confidence < threshold) {
    issues.push({ severity: 'error', message: `confidence ${confidence} is below ${threshold}` });
  }

  if (Reflect.get(result, 'error') !== undefined) {
    issues.push({ severity: 'error', message: 'result reports an error' });
  }
  return issues;
}

function isEmpty(value: unknown): boolean {
  if (value === null || value === undefined || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

export function createQualityAssuranceDefinition(options: { threshold?: number } = {}): AgentDefinition {
  return {
    description: 'Result validation and peer review',
    factory: ({ agentId }) => new QualityAssuranceAgent(agentId, options.threshold),
  };
}
