// Request validation
//
// Rejects malformed requests before routing. Checks field shapes only;
// ordering of timestamps is enforced by the orchestrator, which owns
// the last-seen value.

import { z } from 'zod';
import type { AgentRequest, SubtaskSpec, UserContext } from '../types/requests.js';
import { permissionLevelSchema, validateWith, type ValidationResult } from './common.js';

const paramsSchema = z.record(z.unknown());

export const userContextSchema: z.ZodType<UserContext, z.ZodTypeDef, unknown> = z
  .object({
    userId: z.string().trim().min(1, 'userId is required'),
    role: z.string().min(1).optional(),
    permissionLevel: permissionLevelSchema.optional(),
  })
  .passthrough();

export const subtaskSpecSchema: z.ZodType<SubtaskSpec, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  agentType: z.string().min(1).optional(),
  action: z.string().min(1),
  params: paramsSchema.optional(),
  dependsOn: z.array(z.string().min(1)).optional(),
  resultKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const agentRequestSchema: z.ZodType<AgentRequest, z.ZodTypeDef, unknown> = z
  .object({
    requestId: z.string().min(1),
    agentType: z.string().min(1),
    action: z.string().min(1),
    params: paramsSchema,
    userContext: userContextSchema,
    timestamp: z.number().finite().nonnegative(),
    priority: z.number().int().optional(),
    subtasks: z.array(subtaskSpecSchema).min(1).optional(),
  })
  .superRefine((request, ctx) => {
    if (!request.subtasks) return;

    const seen = new Set<string>();
    request.subtasks.forEach((subtask, index) => {
      if (seen.has(subtask.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['subtasks', index, 'id'],
          message: `Duplicate subtask id: ${subtask.id}`,
        });
      }
      seen.add(subtask.id);
    });
  });

/**
 * Validate an unknown value as an AgentRequest
 */
export function validateAgentRequest(input: unknown): ValidationResult<AgentRequest> {
  return validateWith(agentRequestSchema, input);
}

/**
 * Extract the free-text query from request params
 */
export function getRequestQuery(request: Pick<AgentRequest, 'params'>): string {
  const query = request.params.query;
  return typeof query === 'string' ? query : '';
}
