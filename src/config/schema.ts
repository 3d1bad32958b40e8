/**
 * Zod schemas for validating the conductor configuration file.
 * Orchestrator settings reuse the orchestrator's own schemas, so a file and
 * a stored settings row are validated the same way.
 */
import { z } from 'zod';
import { jsonObjectSchema } from '@/core/json.js';
import { agentIdSchema, orchestratorSettingsSchema } from '@/orchestrator/schemas.js';

// ─── Agent Seeds ────────────────────────────────────────────────

/**
 * Schema for an agent seeded into an empty record store.
 * `configuration.handler` picks a catalog handler other than the agent type.
 */
export const agentSeedSchema = z.object({
  id: agentIdSchema,
  name: z.string().min(1, 'Agent name cannot be empty'),
  type: z.string().min(1, 'Agent type cannot be empty'),
  description: z.string().optional(),
  capabilities: z.array(z.string().min(1)).min(1, 'An agent needs at least one capability'),
  state: z.enum(['inactive', 'active', 'error']).default('active'),
  priority: z.number().int().default(0),
  configuration: jsonObjectSchema.default({}),
});

// ─── Planner ────────────────────────────────────────────────────

export const plannerConfigSchema = z.object({
  /** Per-capability keyword lists; each replaces the built-in list of its capability. */
  keywords: z.record(z.array(z.string().min(1))).default({}),
  /** capability -> capabilities it waits for when both are planned. */
  dependencyRules: z.record(z.array(z.string().min(1))).default({}),
});

// ─── Orchestrator ───────────────────────────────────────────────

export const orchestratorConfigSchema = orchestratorSettingsSchema
  .extend({ retryPolicy: orchestratorSettingsSchema.shape.retryPolicy.partial() })
  .partial();

// ─── Conductor Config File ──────────────────────────────────────

/**
 * Complete configuration file. Every section is optional; an empty object
 * runs the built-in agents with default settings.
 */
export const conductorConfigSchema = z.object({
  orchestrator: orchestratorConfigSchema.default({}),
  agents: z.array(agentSeedSchema).optional(),
  planner: plannerConfigSchema.default({}),
  /** Records the in-memory host gateway starts with, keyed by model. */
  hostRecords: z.record(z.array(jsonObjectSchema)).default({}),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  for (const [index, agent] of (config.agents ?? []).entries()) {
    if (seen.has(agent.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate agent id "${agent.id}"`,
        path: ['agents', index, 'id'],
      });
    }
    seen.add(agent.id);
  }
});
