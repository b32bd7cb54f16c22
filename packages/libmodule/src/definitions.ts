// libmodule/src/definitions.ts
// Conversion between module fragments, overrides and the engine's internal
// definitions.

import { evaluateGuard, isConditional } from './conditional.js';
import { TypeMismatchError } from './errors.js';
import { describeValue } from './option-types.js';
import { DEFAULT_PRIORITY, isOverride, mkOverride } from './priority.js';
import type { Fragment, Guard, Override } from './types.js';

/** One candidate value for one option, after wrappers are peeled off. */
export interface Definition {
    readonly value: unknown;
    readonly priority: number;
    readonly guards: readonly Guard[];
    readonly source: string;
    /**
     * Set on definitions that only carry values for deeper paths (the
     * intermediate levels of a dotted override). They do not compete at
     * their own level and join whichever definitions win there.
     */
    readonly passthrough: boolean;
}

/**
 * Peel mkIf / mkOverride wrappers off a raw value.
 *
 * Conditions accumulate (all must hold). The outermost priority wrapper
 * wins; `fallbackPriority` applies when there is none. A `passthrough`
 * value stays passthrough until it meets a priority wrapper.
 */
export function parseDefinition(
    raw: unknown,
    fallbackPriority: number,
    source: string,
    passthrough = false,
): Definition {
    const collected: Guard[] = [];
    let priority: number | undefined;
    let value = raw;

    for (;;) {
        if (isConditional(value)) {
            collected.push(value.condition);
            value = value.content;
        } else if (isOverride(value)) {
            priority ??= value.priority;
            value = value.value;
        } else {
            break;
        }
    }

    return {
        value,
        priority: priority ?? fallbackPriority,
        guards: collected,
        source,
        passthrough: passthrough && priority === undefined,
    };
}

export interface ToOverridesOptions {
    /** Priority of bare values. @default DEFAULT_PRIORITY */
    priority?: number;
    source?: string;
}

/**
 * Turn a module fragment into overrides, one per key. Keys may be dotted
 * option paths.
 *
 * @example
 * toOverrides({ location: 'westus', tags: mkDefault({}) }, { source: 'user' })
 */
export function toOverrides(fragment: Fragment, options: ToOverridesOptions = {}): Override[] {
    const fallback = options.priority ?? DEFAULT_PRIORITY;
    const overrides: Override[] = [];

    for (const [path, raw] of Object.entries(fragment)) {
        if (raw === undefined) continue;
        const def = parseDefinition(raw, fallback, options.source ?? 'anonymous');
        overrides.push({
            path,
            value: def.value,
            priority: def.priority,
            ...(def.guards.length > 0 ? { guard: combineGuards(def.guards, path) } : {}),
            ...(options.source !== undefined ? { source: options.source } : {}),
        });
    }

    return overrides;
}

/** Modules may return either a fragment or a ready-made override list. */
export function isOverrideList(val: Fragment | readonly Override[]): val is readonly Override[] {
    return Array.isArray(val);
}

/** All guards must hold; a predicate returning a non-boolean is rejected. */
function combineGuards(guards: readonly Guard[], path: string): Guard {
    if (guards.length === 1) return guards[0];
    return () => guards.every(guard => {
        const result = evaluateGuard(guard);
        if (typeof result !== 'boolean') {
            throw new TypeMismatchError(path.split('.'), 'boolean condition', describeValue(result));
        }
        return result;
    });
}

/**
 * Normalize an override into a definition of its top-level option.
 *
 * `a.b.c = v` at priority p becomes a passthrough definition of `a` whose
 * value is `{ b: { c: mkOverride(p, v) } }`: it merges into whatever wins
 * for `a` and `a.b`, and competes at priority p only for `a.b.c`.
 */
export function toDefinition(override: Override): { readonly name: string; readonly definition: Definition } {
    const [name, ...rest] = override.path.split('.');
    const source = override.source ?? 'anonymous';
    const guards = override.guard === undefined ? [] : [override.guard];

    if (rest.length === 0) {
        return {
            name,
            definition: { value: override.value, priority: override.priority, guards, source, passthrough: false },
        };
    }

    let value: unknown = mkOverride(override.priority, override.value);
    for (const segment of [...rest].reverse()) {
        value = { [segment]: value };
    }
    return { name, definition: { value, priority: override.priority, guards, source, passthrough: true } };
}
