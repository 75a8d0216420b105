import { ValidationError } from '../errors.js';
import { Priority } from '../types/priority.js';
import type { ParseResult } from '../types/results.js';

const PRIORITY_ALIASES: Record<string, Priority> = {
  low: Priority.Low,
  l: Priority.Low,
  medium: Priority.Medium,
  med: Priority.Medium,
  m: Priority.Medium,
  high: Priority.High,
  h: Priority.High,
};

/**
 * Parse a priority spelling (case-insensitive, surrounding whitespace
 * ignored). An empty string means the default, medium.
 */
export function parsePriority(input: string): ParseResult<Priority> {
  const normalized = input.trim().toLowerCase();
  if (!normalized) return { type: 'success', value: Priority.Medium };

  // Own keys only: 'constructor' or '__proto__' must not resolve
  const value = Object.hasOwn(PRIORITY_ALIASES, normalized) ? PRIORITY_ALIASES[normalized] : undefined;
  if (value === undefined) {
    return {
      type: 'error',
      error: new ValidationError(
        `Invalid priority '${input}'. Must be one of: low, medium, high`,
        { value: input },
      ),
    };
  }
  return { type: 'success', value };
}

export function validatePriority(input: string): boolean {
  return parsePriority(input).type === 'success';
}

/** Normalize to 'low' | 'medium' | 'high', throwing ValidationError otherwise */
export function normalizePriority(input: string): Priority {
  const result = parsePriority(input);
  if (result.type === 'error') throw result.error;
  return result.value;
}
