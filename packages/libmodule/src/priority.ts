// libmodule/src/priority.ts
// Numeric priority system for competing option definitions.
//
// Lower priority number = higher precedence:
//   mkForce       50    overrides ordinary user values
//   bare value    100   ordinary user-supplied value
//   mkDefault     1000  module-supplied default, easily overridden
//   option default 1500 the declaration's own `default`
//
// Two definitions at the same winning priority with different content → error.

import type { Prioritized } from './types.js';

/** Priority for bare (unwrapped) values. */
export const DEFAULT_PRIORITY = 100;

/** Priority for mkDefault. */
export const MKDEFAULT_PRIORITY = 1000;

/** Priority for mkForce. */
export const MKFORCE_PRIORITY = 50;

/** Priority of an option declaration's own `default`. */
export const OPTION_DEFAULT_PRIORITY = 1500;

/** Named priority levels. */
export const Priority = {
    Force: MKFORCE_PRIORITY,
    Normal: DEFAULT_PRIORITY,
    Default: MKDEFAULT_PRIORITY,
} as const;

/**
 * Attach an explicit priority to a definition.
 *
 * @example
 * location: mkOverride(Priority.Force - 10, 'westus')
 */
export function mkOverride<T>(priority: number, value: T): Prioritized<T> {
    return { __type: 'override', priority, value };
}

/** A module-supplied default: any bare definition replaces it. */
export function mkDefault<T>(value: T): Prioritized<T> {
    return mkOverride(MKDEFAULT_PRIORITY, value);
}

/** Beats bare definitions; only a lower mkOverride beats this. */
export function mkForce<T>(value: T): Prioritized<T> {
    return mkOverride(MKFORCE_PRIORITY, value);
}

/** Check if a value is a priority wrapper. */
export function isOverride(val: unknown): val is Prioritized {
    if (val === null || typeof val !== 'object') return false;
    const candidate = val as Partial<Prioritized>;
    return candidate.__type === 'override' && typeof candidate.priority === 'number';
}
