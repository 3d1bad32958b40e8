/**
 * Planner: decomposes a goal into an ordered task graph.
 *
 * Pure: the same goal, constraints and capability set always give the same
 * plan. Failure to plan is a value (`kind: 'unroutable'`), never a throw.
 */
import type { JsonObject } from '@/core/types.js';
import type {
  CapabilityMatcher,
  Goal,
  PlanConstraints,
  PlanResult,
  PlannedTask,
  StructuredGoal,
} from './types.js';

// ─── Interface ──────────────────────────────────────────────────

export interface Planner {
  decompose(
    goal: Goal,
    context: JsonObject,
    constraints: PlanConstraints,
    capabilities: readonly string[],
  ): PlanResult;
}

export interface PlannerOptions {
  matcher: CapabilityMatcher;
  /** Standing ordering rules: capability -> capabilities it waits for when both are planned. */
  dependencyRules?: Record<string, string[]>;
}

// ─── Text Splitting ─────────────────────────────────────────────

const SEPARATOR = /\s*(,|;|\band\b|\balso\b|\bthen\b)\s*/i;

interface Portion {
  text: string;
  /** Introduced by "then": waits for the portion before it. */
  sequential: boolean;
}

/** Split free text at `,` `;` "and" "also" "then". */
export function splitGoal(text: string): Portion[] {
  const parts = text.split(SEPARATOR);
  const portions: Portion[] = [];
  let sequential = false;

  parts.forEach((part, index) => {
    if (index % 2 === 1) {
      if (part.toLowerCase() === 'then') sequential = true;
      return;
    }
    const trimmed = part.trim();
    if (trimmed === '') return;
    portions.push({ text: trimmed, sequential });
    sequential = false;
  });

  return portions;
}

// ─── Ordering ───────────────────────────────────────────────────

interface Draft {
  key: string;
  capability: string;
  input: JsonObject;
  dependsOn: Set<string>;
  deadlineMs?: number;
}

/** Stable topological order: earliest-appearing ready task first. Null on a cycle. */
function orderDrafts(drafts: Draft[]): Draft[] | null {
  const placed = new Set<string>();
  const ordered: Draft[] = [];
  const remaining = [...drafts];

  while (remaining.length > 0) {
    const index = remaining.findIndex((draft) =>
      [...draft.dependsOn].every((dep) => placed.has(dep)),
    );
    if (index < 0) return null;
    const [next] = remaining.splice(index, 1);
    if (next === undefined) return null;
    placed.add(next.key);
    ordered.push(next);
  }
  return ordered;
}

function applyRules(drafts: Draft[], rules: Record<string, string[]> | undefined): void {
  if (!rules) return;
  const byCapability = new Map(drafts.map((draft) => [draft.capability, draft]));
  for (const draft of drafts) {
    for (const prerequisite of rules[draft.capability] ?? []) {
      const target = byCapability.get(prerequisite);
      if (target && target.key !== draft.key) {
        draft.dependsOn.add(target.key);
      }
    }
  }
}

function finish(drafts: Draft[], unmatched: string[], constraints: PlanConstraints): PlanResult {
  if (drafts.length === 0) {
    return { kind: 'unroutable', reason: 'No capability matched the goal', unmatched };
  }
  if (constraints.maxTasks !== undefined && drafts.length > constraints.maxTasks) {
    return {
      kind: 'unroutable',
      reason: `Goal needs ${drafts.length} tasks, more than the allowed ${constraints.maxTasks}`,
      unmatched,
    };
  }

  const ordered = orderDrafts(drafts);
  if (!ordered) {
    return {
      kind: 'unroutable',
      reason: `Dependency cycle between: ${drafts.map((draft) => draft.key).join(', ')}`,
      unmatched,
    };
  }

  const tasks: PlannedTask[] = ordered.map((draft) => ({
    key: draft.key,
    capability: draft.capability,
    input: draft.input,
    dependsOn: [...draft.dependsOn],
    deadlineMs: draft.deadlineMs ?? constraints.deadlineMs,
  }));
  return { kind: 'plan', tasks, unmatched };
}

// ─── Factory Function ───────────────────────────────────────────

/**
 * Create a planner over a capability matcher.
 */
export function createPlanner(options: PlannerOptions): Planner {
  const { matcher, dependencyRules } = options;

  function planText(
    goal: string,
    constraints: PlanConstraints,
    capabilities: readonly string[],
  ): PlanResult {
    const drafts = new Map<string, Draft & { portions: string[] }>();
    const unmatched: string[] = [];
    let previous: string[] = [];

    for (const portion of splitGoal(goal)) {
      const matched = matcher.match(portion.text, capabilities);
      if (matched.length === 0) {
        unmatched.push(portion.text);
        continue;
      }

      for (const capability of matched) {
        let draft = drafts.get(capability);
        if (!draft) {
          draft = { key: capability, capability, input: {}, dependsOn: new Set(), portions: [] };
          drafts.set(capability, draft);
        }
        if (!draft.portions.includes(portion.text)) {
          draft.portions.push(portion.text);
        }
        if (portion.sequential) {
          for (const before of previous) {
            if (before !== capability) draft.dependsOn.add(before);
          }
        }
      }
      previous = matched;
    }

    const list = [...drafts.values()].map(({ portions, ...draft }) => ({
      ...draft,
      input: { text: portions.join('; '), goal },
    }));
    applyRules(list, dependencyRules);
    applyRules(list, constraints.dependencies);
    return finish(list, unmatched, constraints);
  }

  function planSteps(
    goal: StructuredGoal,
    constraints: PlanConstraints,
    capabilities: readonly string[],
  ): PlanResult {
    const known = new Set(capabilities);
    const count = goal.steps.length;
    const rejected = new Set<number>();

    goal.steps.forEach((step, index) => {
      const badEdge = (step.dependsOn ?? []).some((dep) => dep === index || dep >= count);
      if (!known.has(step.capability) || badEdge) rejected.add(index);
    });

    // a step waiting on a rejected step cannot run either
    let changed = true;
    while (changed) {
      changed = false;
      goal.steps.forEach((step, index) => {
        if (!rejected.has(index) && (step.dependsOn ?? []).some((dep) => rejected.has(dep))) {
          rejected.add(index);
          changed = true;
        }
      });
    }

    const keyOf = (index: number): string => `step-${index}`;
    const unmatched: string[] = [];
    const drafts: Draft[] = [];

    goal.steps.forEach((step, index) => {
      if (rejected.has(index)) {
        unmatched.push(`${keyOf(index)}: ${step.capability}`);
        return;
      }
      drafts.push({
        key: keyOf(index),
        capability: step.capability,
        input: step.input ?? {},
        dependsOn: new Set((step.dependsOn ?? []).map(keyOf)),
        deadlineMs: step.deadlineMs,
      });
    });

    applyRules(drafts, constraints.dependencies);
    return finish(drafts, unmatched, constraints);
  }

  return {
    decompose(goal, _context, constraints, capabilities): PlanResult {
      return typeof goal === 'string'
        ? planText(goal, constraints, capabilities)
        : planSteps(goal, constraints, capabilities);
    },
  };
}
