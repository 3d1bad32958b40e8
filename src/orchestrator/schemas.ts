/**
 * Zod schemas for orchestrator inputs and stored orchestrator records.
 * Shared by the HTTP routes, the MCP gateway, the config loader and the SQLite store.
 */
import { z } from 'zod';
import { ERROR_KINDS } from '@/core/errors.js';
import { toAgentId, toRequestId, toTaskId } from '@/core/ids.js';
import { jsonObjectSchema, jsonValueSchema } from '@/core/json.js';

// ─── Identifiers ────────────────────────────────────────────────

export const agentIdSchema = z.string().min(1).transform(toAgentId);
export const taskIdSchema = z.string().min(1).transform(toTaskId);
export const requestIdSchema = z.string().min(1).transform(toRequestId);

// ─── Goals & Constraints ────────────────────────────────────────

export const structuredStepSchema = z.object({
  capability: z.string().min(1),
  input: jsonObjectSchema.optional(),
  dependsOn: z.array(z.number().int().nonnegative()).optional(),
  deadlineMs: z.number().int().positive().optional(),
});

export const goalSchema = z.union([
  z.string().trim().min(1, 'Goal must not be empty'),
  z.object({ steps: z.array(structuredStepSchema).min(1) }),
]);

export const constraintsSchema = z.object({
  maxTasks: z.number().int().positive().optional(),
  dependencies: z.record(z.array(z.string())).optional(),
  deadlineMs: z.number().int().positive().optional(),
  maxAttempts: z.number().int().positive().optional(),
});

export const callerSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  channel: z.string().min(1),
});

export const processRequestSchema = z.object({
  goal: goalSchema,
  context: jsonObjectSchema.optional(),
  constraints: constraintsSchema.optional(),
});

// ─── Settings ───────────────────────────────────────────────────

export const retryPolicySchema = z.object({
  maxAttempts: z.number().int().positive(),
  backoffBaseMs: z.number().int().nonnegative(),
  backoffCapMs: z.number().int().nonnegative(),
});

export const orchestratorSettingsSchema = z.object({
  plannerAgentId: agentIdSchema.optional(),
  routerAgentId: agentIdSchema.optional(),
  retryPolicy: retryPolicySchema,
  maxConcurrentTasks: z.number().int().positive(),
  taskTimeoutMs: z.number().int().positive(),
  stopPolicy: z.enum(['drain', 'abort']),
  drainTimeoutMs: z.number().int().nonnegative().optional(),
  recentRequestLimit: z.number().int().positive(),
  agentFailureThreshold: z.number().int().nonnegative(),
});

// ─── Stored Records ─────────────────────────────────────────────

export const taskErrorSchema = z.object({
  kind: z.enum(ERROR_KINDS),
  message: z.string(),
  agentId: agentIdSchema.optional(),
});

const taskOutputSchema = z.object({
  taskId: taskIdSchema,
  key: z.string(),
  capability: z.string(),
  agentId: agentIdSchema.nullable(),
  output: jsonValueSchema,
});

const taskFailureSchema = z.object({
  taskId: taskIdSchema,
  key: z.string(),
  capability: z.string(),
  attempts: z.number().int(),
  error: taskErrorSchema,
});

export const requestOutcomeSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('success'),
    requestId: requestIdSchema,
    outputs: z.array(taskOutputSchema),
    unmatched: z.array(z.string()),
  }),
  z.object({
    status: z.literal('partial_failure'),
    requestId: requestIdSchema,
    outputs: z.array(taskOutputSchema),
    failures: z.array(taskFailureSchema),
    unmatched: z.array(z.string()),
  }),
  z.object({
    status: z.literal('unroutable'),
    requestId: requestIdSchema,
    reason: z.string(),
    unmatched: z.array(z.string()),
  }),
]);
