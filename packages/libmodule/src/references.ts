// libmodule/src/references.ts
// Resource references: a field may hold either an opaque external identifier
// or a handle to another resource declared in the same deployment. Handles
// are looked up lazily, so a resource may refer to one declared later.

import { DuplicateResourceError, UnknownResourceError } from './errors.js';

/** Handle naming another declared resource by kind and name. */
export class ResourceHandle<K extends string = string> {
    constructor(readonly kind: K, readonly name: string) {
        Object.freeze(this);
    }

    toString(): string {
        return `${this.kind}:${this.name}`;
    }
}

/** Refer to the resource of `kind` declared under `name`. */
export function resource<K extends string>(kind: K, name: string): ResourceHandle<K> {
    return new ResourceHandle(kind, name);
}

export function isResourceHandle(val: unknown): val is ResourceHandle {
    return val instanceof ResourceHandle;
}

/** A reference field after resolution against a registry. */
export type ResourceRef<R = unknown> =
    | { readonly type: 'literal'; readonly id: string }
    | { readonly type: 'handle'; readonly kind: string; readonly name: string; readonly resource: R };

export class ResourceRegistry<R = unknown> {
    private readonly entries = new Map<string, R>();

    register(kind: string, name: string, value: R): this {
        const key = registryKey(kind, name);
        if (this.entries.has(key)) {
            throw new DuplicateResourceError(kind, name);
        }
        this.entries.set(key, value);
        return this;
    }

    lookup(kind: string, name: string): R | undefined {
        return this.entries.get(registryKey(kind, name));
    }

    has(kind: string, name: string): boolean {
        return this.entries.has(registryKey(kind, name));
    }
}

function registryKey(kind: string, name: string): string {
    return `${kind}\u0000${name}`;
}

/**
 * Resolve a string-or-handle field. Strings are returned as literal
 * identifiers without touching the registry.
 */
export function resolveReference<R>(
    value: string | ResourceHandle,
    registry: ResourceRegistry<R>,
): ResourceRef<R> {
    if (typeof value === 'string') {
        return { type: 'literal', id: value };
    }
    const found = registry.lookup(value.kind, value.name);
    if (found === undefined) {
        throw new UnknownResourceError(value.kind, value.name);
    }
    return { type: 'handle', kind: value.kind, name: value.name, resource: found };
}

/** Like resolveReference, for nullable reference fields. */
export function resolveOptionalReference<R>(
    value: string | ResourceHandle | null,
    registry: ResourceRegistry<R>,
): ResourceRef<R> | null {
    return value === null ? null : resolveReference(value, registry);
}
