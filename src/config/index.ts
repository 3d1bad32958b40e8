// ─── Types ──────────────────────────────────────────────────────
export type { AgentSeed, ConductorConfig, OrchestratorConfig } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  agentSeedSchema,
  conductorConfigSchema,
  orchestratorConfigSchema,
  plannerConfigSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  ConfigError,
  loadConductorConfig,
  mergeSettings,
  parseConductorConfig,
  resolveEnvVars,
} from './loader.js';
