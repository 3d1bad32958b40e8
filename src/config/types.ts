import type { z } from 'zod';
import type { agentSeedSchema, conductorConfigSchema, orchestratorConfigSchema } from './schema.js';

// ─── Conductor Configuration ────────────────────────────────────

/** Configuration as loaded from a JSON file, defaults applied. */
export type ConductorConfig = z.infer<typeof conductorConfigSchema>;

/** An agent record to seed, without its handler. */
export type AgentSeed = z.infer<typeof agentSeedSchema>;

/** Settings overrides; a partial retry policy merges into the default one. */
export type OrchestratorConfig = z.infer<typeof orchestratorConfigSchema>;
