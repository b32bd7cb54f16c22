// libmodule/src/conditional.ts
// Conditional definitions: a definition wrapped in mkIf only contributes
// when its condition holds.

import type { Conditional, Guard } from './types.js';

/**
 * Activate `content` only when `condition` holds.
 *
 * A predicate is evaluated during resolution, after every option it reads
 * has been resolved, so it may depend on the final configuration.
 *
 * @example
 * subnets: mkIf(() => config.addressSpace.length > 0, mkDefault({ ... }))
 */
export function mkIf<T>(condition: Guard, content: T): Conditional<T> {
    return { __type: 'if', condition, content };
}

/** Check if a value is an mkIf wrapper. */
export function isConditional(val: unknown): val is Conditional {
    return (
        val !== null &&
        typeof val === 'object' &&
        (val as Conditional).__type === 'if'
    );
}

/** Evaluate a guard. Predicates may return anything; callers check for boolean. */
export function evaluateGuard(guard: Guard): unknown {
    return typeof guard === 'function' ? guard() : guard;
}
