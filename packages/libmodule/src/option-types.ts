// libmodule/src/option-types.ts
// Value types for option declarations and their validation.
//
// `validate` never mutates its input: it either returns the value it was
// given or throws a TypeMismatchError naming the innermost failing path.

import { isPlainRecord } from './deferred.js';
import { TypeMismatchError } from './errors.js';
import type { OptionPath } from './errors.js';
import { isResourceHandle } from './references.js';
import type {
    AttrsOfType, BoolType, ConfigOf, EitherType, IntType, ListOfType,
    NullOrType, OptionSet, ResourceType, StrType, SubmoduleType, TypeSpec, ValueOf,
} from './types.js';

// ─── Constructors ───────────────────────────────────────────────────

const str: StrType = { kind: 'str' };
const int: IntType = { kind: 'int' };
const bool: BoolType = { kind: 'bool' };

export const types = {
    str,
    int,
    bool,
    listOf<E extends TypeSpec>(elem: E): ListOfType<E> {
        return { kind: 'listOf', elem };
    },
    attrsOf<E extends TypeSpec>(elem: E): AttrsOfType<E> {
        return { kind: 'attrsOf', elem };
    },
    nullOr<E extends TypeSpec>(elem: E): NullOrType<E> {
        return { kind: 'nullOr', elem };
    },
    either<L extends TypeSpec, R extends TypeSpec>(left: L, right: R): EitherType<L, R> {
        return { kind: 'either', left, right };
    },
    /** A nested option set, e.g. one subnet of a network. */
    submodule<S extends OptionSet>(options: S): SubmoduleType<S> {
        return { kind: 'submodule', options };
    },
    resource<K extends string>(resourceKind: K): ResourceType<K> {
        return { kind: 'resource', resourceKind };
    },
} as const;

// ─── Descriptions ───────────────────────────────────────────────────

function describeNested(type: TypeSpec): string {
    const text = describeType(type);
    return type.kind === 'either' || type.kind === 'nullOr' ? `(${text})` : text;
}

/** Human-readable type name used in error messages. */
export function describeType(type: TypeSpec): string {
    switch (type.kind) {
        case 'str': return 'string';
        case 'int': return 'signed integer';
        case 'bool': return 'boolean';
        case 'listOf': return `list of ${describeNested(type.elem)}`;
        case 'attrsOf': return `attribute set of ${describeNested(type.elem)}`;
        case 'nullOr': return `null or ${describeNested(type.elem)}`;
        case 'either': return `${describeNested(type.left)} or ${describeNested(type.right)}`;
        case 'submodule': return 'submodule';
        case 'resource': return `resource of kind "${type.resourceKind}"`;
    }
}

/** Short description of an arbitrary value, used as `got` in errors. */
export function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (Array.isArray(value)) return 'a list';
    if (isResourceHandle(value)) return `resource "${value.kind}:${value.name}"`;
    switch (typeof value) {
        case 'string': return `string ${JSON.stringify(value)}`;
        case 'number': return `number ${value}`;
        case 'boolean': return `boolean ${value}`;
        case 'function': return 'a function';
        case 'object': return isPlainRecord(value) ? 'an attribute set' : 'an object';
        default: return typeof value;
    }
}

// ─── Validation ─────────────────────────────────────────────────────

/** Throw a TypeMismatchError unless `value` conforms to `type`. */
export function check(type: TypeSpec, value: unknown, path: OptionPath = []): void {
    const mismatch = (): TypeMismatchError =>
        new TypeMismatchError(path, describeType(type), describeValue(value));

    switch (type.kind) {
        case 'str':
            if (typeof value !== 'string') throw mismatch();
            return;
        case 'int':
            if (typeof value !== 'number' || !Number.isInteger(value)) throw mismatch();
            return;
        case 'bool':
            if (typeof value !== 'boolean') throw mismatch();
            return;
        case 'listOf':
            if (!Array.isArray(value)) throw mismatch();
            value.forEach((item: unknown, i) => check(type.elem, item, [...path, String(i)]));
            return;
        case 'attrsOf':
            if (!isPlainRecord(value)) throw mismatch();
            for (const [key, item] of Object.entries(value)) {
                check(type.elem, item, [...path, key]);
            }
            return;
        case 'nullOr':
            if (value === null) return;
            check(type.elem, value, path);
            return;
        case 'either':
            try {
                check(type.left, value, path);
            } catch (leftError) {
                if (!(leftError instanceof TypeMismatchError)) throw leftError;
                try {
                    check(type.right, value, path);
                } catch (rightError) {
                    if (!(rightError instanceof TypeMismatchError)) throw rightError;
                    throw leftError;
                }
            }
            return;
        case 'submodule':
            if (!isPlainRecord(value)) throw mismatch();
            for (const [key, item] of Object.entries(value)) {
                if (!Object.hasOwn(type.options, key)) {
                    throw new TypeMismatchError([...path, key], 'a declared option', 'an undeclared option');
                }
                check(type.options[key].type, item, [...path, key]);
            }
            return;
        case 'resource':
            if (!isResourceHandle(value) || value.kind !== type.resourceKind) throw mismatch();
            return;
    }
}

function assertValue<T extends TypeSpec>(
    type: T,
    value: unknown,
    path: OptionPath,
): asserts value is ValueOf<T> {
    check(type, value, path);
}

/** Validate `value` against `type`, returning it unchanged on success. */
export function validate<T extends TypeSpec>(type: T, value: unknown, path: OptionPath = []): ValueOf<T> {
    assertValue(type, value, path);
    return value;
}

function assertConfig<S extends OptionSet>(
    options: S,
    value: unknown,
    path: OptionPath,
): asserts value is ConfigOf<S> {
    check(types.submodule(options), value, path);
}

/** Validate a whole option-set instance. */
export function validateConfig<S extends OptionSet>(options: S, value: unknown, path: OptionPath = []): ConfigOf<S> {
    assertConfig(options, value, path);
    return value;
}
