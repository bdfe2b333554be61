/**
 * CLI helpers: store resolution, argument parsing, error handling.
 */

import type { Command } from 'commander';
import { InvalidInputError, TaskFilter, loadStore } from '@todo/core';
import type { TaskStore } from '@todo/core';
import { resolveStorePath } from './config.js';
import * as out from './output.js';

export type GlobalOptions = {
  path?: string;
};

/** Load the store named by the global --path option (or its defaults) */
export function openStore(cmd: Command): TaskStore {
  const g = cmd.optsWithGlobals<GlobalOptions>();
  return loadStore(resolveStorePath(g.path));
}

/**
 * Parse a task index argument. Only the text is checked here; negative or
 * out-of-range values are left for the store to reject.
 */
export function parseIndex(text: string): number {
  const trimmed = text.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidInputError(`Invalid task index "${text}": expected a whole number`);
  }
  return Number.parseInt(trimmed, 10);
}

/** Map the list command's flags to a filter; null when both are set */
export function resolveFilter(completed: boolean, pending: boolean): TaskFilter | null {
  if (completed && pending) return null;
  if (completed) return TaskFilter.Completed;
  if (pending) return TaskFilter.Pending;
  return TaskFilter.All;
}

/**
 * Run a command action, printing any error and marking the process as failed.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
    process.exitCode = 1;
  }
}
