/**
 * Configuration loader: reads the JSON config file, resolves environment
 * variable placeholders, and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { ConductorError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { orchestratorSettingsSchema } from '@/orchestrator/schemas.js';
import type { OrchestratorSettings } from '@/orchestrator/types.js';

import { conductorConfigSchema } from './schema.js';
import type { ConductorConfig, OrchestratorConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends ConductorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      kind: 'Validation',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the exact form `${VAR_NAME}` with the
 * value of that environment variable.
 *
 * @throws ConfigError if a referenced variable is not defined
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName === undefined) return obj;

    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigError(`Environment variable "${varName}" is not defined`, {
        variableName: varName,
      });
    }
    return value;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value);
    }
    return result;
  }

  return obj;
}

// ─── Configuration Loader ───────────────────────────────────────

/** Validate an already-parsed configuration object. */
export function parseConductorConfig(
  raw: unknown,
  source = 'inline',
): Result<ConductorConfig, ConfigError> {
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(raw);
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    throw error;
  }

  const validation = conductorConfigSchema.safeParse(resolved);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { source, issues }));
  }
  return ok(validation.data);
}

/**
 * Loads and validates a conductor configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadConductorConfig(
  filePath: string,
): Promise<Result<ConductorConfig, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: code,
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (error) {
    return err(
      new ConfigError('Invalid JSON in configuration file', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  return parseConductorConfig(parsed, filePath);
}

// ─── Settings Merge ─────────────────────────────────────────────

/**
 * Apply overrides on top of base settings. Later layers win; the retry
 * policy merges field by field. The result is validated again.
 */
export function mergeSettings(
  base: OrchestratorSettings,
  ...layers: (OrchestratorConfig | Partial<OrchestratorSettings> | null | undefined)[]
): OrchestratorSettings {
  let settings: OrchestratorSettings = base;
  for (const layer of layers) {
    if (!layer) continue;
    const { retryPolicy, ...rest } = layer;
    settings = orchestratorSettingsSchema.parse({
      ...settings,
      ...rest,
      retryPolicy: { ...settings.retryPolicy, ...retryPolicy },
    });
  }
  return settings;
}
