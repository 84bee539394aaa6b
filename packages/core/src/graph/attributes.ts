/**
 * sdfkit Core: Scheduling Attribute Rules
 *
 * Shared by protection domains and virtual machines. Each check returns the
 * failure to report, or undefined when the value is acceptable.
 */

import { ErrorKind, fail, type Result } from '../types/result.js';

export const DEFAULT_PRIORITY = 100;
export const MAX_PRIORITY = 255;
export const MIN_STACK_SIZE = 0x1000;
export const MAX_STACK_SIZE = 0x100000;

export interface Schedule {
  priority?: number | undefined;
  budget?: number | undefined;
  period?: number | undefined;
}

function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function checkPriority(owner: string, value: number): Result<never> | undefined {
  if (!isCount(value) || value > MAX_PRIORITY) {
    return fail(
      ErrorKind.InvalidArgument,
      `priority ${value} of '${owner}' must be an integer in 0..${MAX_PRIORITY}`,
    );
  }
  return undefined;
}

/** Budget and period are microsecond counts; a budget may not exceed its period. */
export function checkBudgetPeriod(
  owner: string,
  budget: number | undefined,
  period: number | undefined,
): Result<never> | undefined {
  for (const [label, value] of [['budget', budget], ['period', period]] as const) {
    if (value !== undefined && !isCount(value)) {
      return fail(ErrorKind.InvalidArgument, `${label} ${value} of '${owner}' must be a non-negative integer`);
    }
  }
  if (budget !== undefined && period !== undefined && budget > period) {
    return fail(
      ErrorKind.InvalidArgument,
      `budget ${budget} of '${owner}' exceeds its period ${period}`,
    );
  }
  return undefined;
}

export function checkStackSize(owner: string, value: number): Result<never> | undefined {
  if (
    !Number.isSafeInteger(value) ||
    value % MIN_STACK_SIZE !== 0 ||
    value < MIN_STACK_SIZE ||
    value > MAX_STACK_SIZE
  ) {
    return fail(
      ErrorKind.InvalidArgument,
      `stack size ${value} of '${owner}' must be a multiple of 0x1000 in 0x1000..0x100000`,
    );
  }
  return undefined;
}

export function checkCpu(owner: string, value: number): Result<never> | undefined {
  if (!isCount(value)) {
    return fail(ErrorKind.InvalidArgument, `cpu ${value} of '${owner}' must be a non-negative integer`);
  }
  return undefined;
}

/** Validate a full schedule at once; used when creating an entity. */
export function checkSchedule(owner: string, schedule: Schedule): Result<never> | undefined {
  if (schedule.priority !== undefined) {
    const bad = checkPriority(owner, schedule.priority);
    if (bad) return bad;
  }
  return checkBudgetPeriod(owner, schedule.budget, schedule.period);
}
