/**
 * chalk-based output formatting for the command line.
 */

import chalk from 'chalk';
import { Priority } from '@todo/core';
import type { IndexedTask, TaskStats } from '@todo/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority | null): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
    default: return chalk.dim('·  ');
  }
}

export function formatIndex(index: number): string {
  return chalk.dim(`(${index})`);
}

export function formatTaskLine({ index, task }: IndexedTask): string {
  const title = task.completed ? chalk.dim(task.title) : chalk.bold(task.title);
  return `${formatIndex(index)} ${formatPriority(task.priority)} ${formatCheckbox(task.completed)} ${title}`;
}

export function formatStats(stats: TaskStats): string {
  const completed = stats.completed > 0 ? chalk.green(`${stats.completed} completed`) : chalk.dim('0 completed');
  const pending = stats.pending > 0 ? chalk.gray(`${stats.pending} pending`) : chalk.dim('0 pending');
  return `Total tasks: ${chalk.bold(String(stats.total))} (${pending}, ${completed})`;
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
