/**
 * Planner and router agent handlers. They expose the engine's own planning
 * and routing decisions as agent executions, so a caller can ask for a plan
 * or a routing choice without running anything.
 */
import { NoAgentAvailableError } from '@/core/errors.js';
import type { JsonValue } from '@/core/types.js';
import { constraintsSchema, goalSchema } from '@/orchestrator/schemas.js';
import type { Planner } from '@/planning/planner.js';
import type { CapabilityMatcher, PlannedTask } from '@/planning/types.js';
import type { Router } from '@/routing/router.js';
import type { AgentHandler } from '../types.js';
import { stringField, taskText } from './input.js';

function describePlannedTask(task: PlannedTask): JsonValue {
  return {
    key: task.key,
    capability: task.capability,
    input: task.input,
    dependsOn: task.dependsOn,
    deadlineMs: task.deadlineMs ?? null,
  };
}

// ─── Planner ────────────────────────────────────────────────────

export interface PlannerHandlerDeps {
  planner: Planner;
  /** Capabilities a plan may use. */
  capabilities: () => string[];
}

/**
 * Plans `input.goal` (or the task text) under `input.constraints`.
 * Answers `{ status: 'planned', tasks, unmatched }` or `{ status: 'unroutable', reason, unmatched }`.
 */
export function createPlannerHandler(deps: PlannerHandlerDeps): AgentHandler {
  return (task) => {
    const goal = goalSchema.safeParse(task.input['goal'] ?? taskText(task));
    if (!goal.success) {
      return Promise.resolve({
        status: 'invalid_goal',
        message: goal.error.issues[0]?.message ?? 'Invalid goal',
      });
    }
    const constraints = constraintsSchema.safeParse(task.input['constraints'] ?? {});
    const plan = deps.planner.decompose(
      goal.data,
      task.context,
      constraints.success ? constraints.data : {},
      deps.capabilities(),
    );

    if (plan.kind === 'unroutable') {
      return Promise.resolve({ status: 'unroutable', reason: plan.reason, unmatched: plan.unmatched });
    }
    return Promise.resolve({
      status: 'planned',
      tasks: plan.tasks.map(describePlannedTask),
      unmatched: plan.unmatched,
    });
  };
}

// ─── Router ─────────────────────────────────────────────────────

export interface RouterHandlerDeps {
  router: Pick<Router, 'route'>;
  matcher: CapabilityMatcher;
  capabilities: () => string[];
}

/**
 * Picks the agent for `input.capability`, or for the capability the task
 * text matches first.
 */
export function createRouterHandler(deps: RouterHandlerDeps): AgentHandler {
  return (task) => {
    const capability =
      stringField(task.input, 'capability') ??
      deps.matcher.match(taskText(task), deps.capabilities())[0];
    if (capability === undefined) {
      return Promise.resolve({ status: 'unknown_action' });
    }

    try {
      const agent = deps.router.route({ capability });
      return Promise.resolve({
        status: 'routed',
        capability,
        agentId: agent.record.id,
        agentName: agent.record.name,
      });
    } catch (error) {
      if (error instanceof NoAgentAvailableError) {
        return Promise.resolve({ status: 'no_agent', capability, message: error.message });
      }
      return Promise.reject(error);
    }
  };
}
