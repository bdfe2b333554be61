import { Priority } from '../types/priority.js';
import { InvalidInputError } from '../errors.js';

const PRIORITY_ALIASES = new Map<string, Priority>([
  ['high', Priority.High], ['h', Priority.High], ['p1', Priority.High], ['1', Priority.High],
  ['medium', Priority.Medium], ['m', Priority.Medium], ['p2', Priority.Medium], ['2', Priority.Medium],
  ['low', Priority.Low], ['l', Priority.Low], ['p3', Priority.Low], ['3', Priority.Low],
]);

/**
 * Parse a priority argument (case-insensitive).
 * Accepts high/medium/low, h/m/l, p1/p2/p3 and 1/2/3.
 */
export function parsePriority(text: string): Priority {
  const priority = PRIORITY_ALIASES.get(text.trim().toLowerCase());
  if (priority === undefined) {
    throw new InvalidInputError(`Invalid priority "${text}": expected high, medium or low`);
  }
  return priority;
}
