// libmodule/src/deferred.ts
// Deferred values, computed when the engine merges the option they belong to.

import { isOverride } from './priority.js';
import type { Deferred } from './types.js';

/**
 * Mark a value as deferred. Use this to read other options of the final
 * configuration from inside a module.
 *
 * @example
 * const mod = (config) => ({
 *   subnets: mkDefault(deferred(() => ({
 *     default: { addressPrefix: config.addressSpace[0] },
 *   }))),
 * });
 */
export function deferred<T>(fn: () => T): Deferred<T> {
    return { __deferred: true, fn };
}

/** Check if a value is a deferred wrapper. */
export function isDeferred(val: unknown): val is Deferred {
    return val !== null && typeof val === 'object' && (val as Deferred).__deferred === true;
}

/** True for `{...}` literals and `Object.create(null)` records. */
export function isPlainRecord(val: unknown): val is Record<string, unknown> {
    if (val === null || typeof val !== 'object' || Array.isArray(val)) return false;
    const proto: unknown = Object.getPrototypeOf(val);
    return proto === Object.prototype || proto === null;
}

/**
 * Recursively force deferred values and unwrap priority wrappers.
 *
 * Arrays and plain records are copied; class instances (resource handles)
 * are kept as they are.
 */
export function resolveDeferred(obj: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
    if (obj === null || obj === undefined) return obj;

    if (isOverride(obj)) {
        return resolveDeferred(obj.value, visited);
    }
    if (isDeferred(obj)) {
        return resolveDeferred(obj.fn(), visited);
    }

    if (typeof obj !== 'object') return obj;
    if (visited.has(obj)) {
        throw new Error('Cannot resolve a value that contains itself.');
    }

    if (Array.isArray(obj)) {
        visited.add(obj);
        const items = obj.map((item: unknown) => resolveDeferred(item, visited));
        visited.delete(obj);
        return items;
    }
    if (!isPlainRecord(obj)) return obj;

    visited.add(obj);
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
        resolved[key] = resolveDeferred(value, visited);
    }
    visited.delete(obj);
    return resolved;
}

/** Freeze arrays and plain records recursively. */
export function deepFreeze<T>(value: T): T {
    if (Array.isArray(value)) {
        for (const item of value) deepFreeze(item);
        Object.freeze(value);
    } else if (isPlainRecord(value)) {
        for (const item of Object.values(value)) deepFreeze(item);
        Object.freeze(value);
    }
    return value;
}
