/**
 * Planner types: goals, constraints, and the plan a goal decomposes into.
 */
import type { JsonObject } from '@/core/types.js';

// ─── Goals ──────────────────────────────────────────────────────

export interface StructuredStep {
  capability: string;
  input?: JsonObject;
  /** Indices of earlier or later steps this one waits for. */
  dependsOn?: number[];
  deadlineMs?: number;
}

export interface StructuredGoal {
  steps: StructuredStep[];
}

/** Free text, or an explicit list of steps. */
export type Goal = string | StructuredGoal;

// ─── Constraints ────────────────────────────────────────────────

export interface PlanConstraints {
  /** Upper bound on the number of planned tasks. */
  maxTasks?: number;
  /** Extra ordering edges: capability -> capabilities it waits for. */
  dependencies?: Record<string, string[]>;
  /** Deadline applied to every task that does not set its own. */
  deadlineMs?: number;
}

// ─── Plan ───────────────────────────────────────────────────────

export interface PlannedTask {
  /** Unique within the plan. */
  key: string;
  capability: string;
  input: JsonObject;
  /** Keys of the tasks this one waits for. */
  dependsOn: string[];
  deadlineMs?: number;
}

export type PlanResult =
  | { kind: 'plan'; tasks: PlannedTask[]; unmatched: string[] }
  | { kind: 'unroutable'; reason: string; unmatched: string[] };

// ─── Matcher ────────────────────────────────────────────────────

/** Maps a portion of free text onto zero or more known capabilities. */
export interface CapabilityMatcher {
  match(portion: string, capabilities: readonly string[]): string[];
}

/** Capability -> keywords that select it. */
export type KeywordTable = Record<string, string[]>;
