/**
 * Readers for loosely-shaped task input.
 */
import type { JsonObject, JsonValue } from '@/core/types.js';
import type { AgentTaskInput } from '../types.js';

export function stringField(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function numberField(source: JsonObject, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function objectField(source: JsonObject, key: string): JsonObject | undefined {
  const value = source[key];
  return isJsonObject(value) ? value : undefined;
}

/** The free text a task carries: its planned text, else the whole goal. */
export function taskText(task: AgentTaskInput): string {
  return stringField(task.input, 'text') ?? stringField(task.input, 'goal') ?? '';
}

const SUBJECT_PATTERN = /\bfor\s+(?:the\s+|a\s+|an\s+)?(.+?)\s*$/i;

/**
 * Who or what the task is about: `input.name`, else the words after the
 * first "for" in the first portion of the text ("create a lead for Acme" -> "Acme").
 */
export function taskSubject(task: AgentTaskInput): string | undefined {
  const named = stringField(task.input, 'name');
  if (named !== undefined) return named;

  const [firstPortion = ''] = taskText(task).split(';');
  return SUBJECT_PATTERN.exec(firstPortion.replace(/[.!?]+$/, ''))?.[1];
}

/** First number found under `key` in the outputs of completed dependencies. */
export function fromDependencies(task: AgentTaskInput, key: string): number | undefined {
  for (const output of Object.values(task.dependencyOutputs)) {
    if (isJsonObject(output)) {
      const value = numberField(output, key);
      if (value !== undefined) return value;
    }
  }
  return undefined;
}
