// libmodule/src/types.ts
// Core type definitions for the typed option system.

import type { ResourceHandle } from './references.js';

// ─── Deferred ───────────────────────────────────────────────────────

/** Deferred value, computed only when the engine needs it. */
export interface Deferred<T = unknown> {
    readonly __deferred: true;
    readonly fn: () => T;
}

// ─── Priority ───────────────────────────────────────────────────────

/**
 * Priority wrapper.
 *
 * Lower priority number = higher precedence.
 *   mkForce:    priority 50
 *   bare value: priority 100 (implicit, DEFAULT_PRIORITY)
 *   mkDefault:  priority 1000
 */
export interface Prioritized<T = unknown> {
    readonly __type: 'override';
    readonly priority: number;
    readonly value: T;
}

// ─── Conditional ────────────────────────────────────────────────────

/** Activation condition: a plain boolean or a lazily evaluated predicate. */
export type Guard = boolean | (() => boolean);

/** Definition that only contributes when its condition holds. */
export interface Conditional<T = unknown> {
    readonly __type: 'if';
    readonly condition: Guard;
    readonly content: T;
}

// ─── Value Types ────────────────────────────────────────────────────

export interface StrType {
    readonly kind: 'str';
}

export interface IntType {
    readonly kind: 'int';
}

export interface BoolType {
    readonly kind: 'bool';
}

export interface ListOfType<E extends TypeSpec = TypeSpec> {
    readonly kind: 'listOf';
    readonly elem: E;
}

export interface AttrsOfType<E extends TypeSpec = TypeSpec> {
    readonly kind: 'attrsOf';
    readonly elem: E;
}

export interface NullOrType<E extends TypeSpec = TypeSpec> {
    readonly kind: 'nullOr';
    readonly elem: E;
}

export interface EitherType<L extends TypeSpec = TypeSpec, R extends TypeSpec = TypeSpec> {
    readonly kind: 'either';
    readonly left: L;
    readonly right: R;
}

export interface SubmoduleType<S extends OptionSet = OptionSet> {
    readonly kind: 'submodule';
    readonly options: S;
}

/** Handle to another declared resource of the given kind. */
export interface ResourceType<K extends string = string> {
    readonly kind: 'resource';
    readonly resourceKind: K;
}

export type TypeSpec =
    | StrType
    | IntType
    | BoolType
    | ListOfType
    | AttrsOfType
    | NullOrType
    | EitherType
    | SubmoduleType
    | ResourceType;

/** Static type of the values accepted by a TypeSpec. */
export type ValueOf<T extends TypeSpec> =
    T extends StrType ? string :
    T extends IntType ? number :
    T extends BoolType ? boolean :
    T extends ListOfType<infer E> ? readonly ValueOf<E>[] :
    T extends AttrsOfType<infer E> ? Readonly<Record<string, ValueOf<E>>> :
    T extends NullOrType<infer E> ? ValueOf<E> | null :
    T extends EitherType<infer L, infer R> ? ValueOf<L> | ValueOf<R> :
    T extends SubmoduleType<infer S> ? ConfigOf<S> :
    T extends ResourceType<infer K> ? ResourceHandle<K> :
    never;

// ─── Options ────────────────────────────────────────────────────────

export interface OptionDecl<T extends TypeSpec = TypeSpec> {
    readonly type: T;
    /** Absent means the option is mandatory. */
    readonly default?: ValueOf<T>;
    /** Documents a default supplied by a module's config block. */
    readonly defaultText?: string;
    readonly example?: unknown;
    readonly description: string;
}

/** Declaration shape the engine works with; `mkOption` checks defaults statically. */
export interface AnyOptionDecl {
    readonly type: TypeSpec;
    readonly default?: unknown;
    readonly defaultText?: string;
    readonly example?: unknown;
    readonly description: string;
}

export type OptionSet = Readonly<Record<string, AnyOptionDecl>>;

/** Fully resolved configuration of an option set. */
export type ConfigOf<S extends OptionSet> = {
    readonly [K in keyof S]: ValueOf<S[K]['type']>;
};

// ─── Overrides ──────────────────────────────────────────────────────

/** A candidate value for one option path. */
export interface Override {
    /** Dotted option address, e.g. `subnets.default.addressPrefix`. */
    readonly path: string;
    readonly value: unknown;
    readonly priority: number;
    readonly guard?: Guard;
    /** Contributor name used in diagnostics. */
    readonly source?: string;
}

/** Module contribution written as a plain record of option values. */
export type Fragment = Readonly<Record<string, unknown>>;
