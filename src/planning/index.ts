// Planning module: goal decomposition and capability matching
export type {
  CapabilityMatcher,
  Goal,
  KeywordTable,
  PlanConstraints,
  PlannedTask,
  PlanResult,
  StructuredGoal,
  StructuredStep,
} from './types.js';

export { DEFAULT_KEYWORDS, createKeywordMatcher } from './capability-matcher.js';
export { createPlanner, splitGoal } from './planner.js';
export type { Planner, PlannerOptions } from './planner.js';
