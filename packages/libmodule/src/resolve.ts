// libmodule/src/resolve.ts
// Override engine: merges the definitions of every option of an option set
// into one resolved, validated and frozen configuration.
//
// Resolution is demand-driven. Reading `config.x` from a guard or deferred
// value resolves `x` first, so guards run in dependency order; re-entering
// an option that is still being resolved is an UnresolvableGuardError.
//
// For each option:
//   1. drop definitions whose guard is false
//   2. keep the definitions at the highest priority (lowest number), the
//      declared default competing at OPTION_DEFAULT_PRIORITY; passthrough
//      definitions from dotted overrides join the winners
//   3. merge them: leaves must agree, attribute sets merge key by key,
//      nested values compete at the priority of the definition holding them
//   4. without any active definition the option is missing
//   5. validate the merged value against the option type

import { isDeepStrictEqual } from 'node:util';
import type { Logger } from 'pino';
import { evaluateGuard } from './conditional.js';
import { deepFreeze, isDeferred, isPlainRecord, resolveDeferred } from './deferred.js';
import { isOverrideList, parseDefinition, toDefinition, toOverrides } from './definitions.js';
import type { Definition } from './definitions.js';
import {
    ConflictingOverridesError, MissingRequiredOptionError, TypeMismatchError,
    UnknownOptionError, UnresolvableGuardError, formatPath,
} from './errors.js';
import type { OptionPath } from './errors.js';
import { logger as defaultLogger } from './logger.js';
import { check, describeType, describeValue, validateConfig } from './option-types.js';
import { OPTION_DEFAULT_PRIORITY } from './priority.js';
import type { AnyOptionDecl, ConfigOf, Fragment, OptionSet, Override, TypeSpec } from './types.js';

export interface ResolveSettings {
    /** Logger for resolution traces. Defaults to the package logger. */
    logger?: Logger;
}

/** A module contributes definitions, reading the final configuration lazily. */
export type ModuleFn<S extends OptionSet> = (config: ConfigOf<S>) => Fragment | readonly Override[];

const MISSING: unique symbol = Symbol('libmodule.missing');

interface SourcedRecord {
    readonly record: Record<string, unknown>;
    readonly source: string;
    readonly priority: number;
    readonly passthrough: boolean;
}

interface Selection {
    readonly priority: number;
    readonly winners: readonly Definition[];
}

class OptionResolver<S extends OptionSet> {
    private readonly definitions = new Map<string, Definition[]>();
    private readonly results = new Map<string, unknown>();
    private readonly inProgress = new Set<string>();

    constructor(
        private readonly options: S,
        overrides: readonly Override[],
        private readonly logger: Logger,
    ) {
        for (const override of overrides) {
            const { name, definition } = toDefinition(override);
            if (!Object.hasOwn(options, name)) {
                throw new UnknownOptionError(override.path.split('.'));
            }
            const list = this.definitions.get(name) ?? [];
            list.push(definition);
            this.definitions.set(name, list);
        }
    }

    /** Resolve every option in declaration order. */
    run(): ConfigOf<S> {
        const result: Record<string, unknown> = {};
        const missing: string[] = [];

        for (const name of Object.keys(this.options)) {
            const value = this.resolveTop(name);
            if (value === MISSING) {
                missing.push(name);
            } else {
                result[name] = value;
            }
        }

        if (missing.length > 0) {
            throw new MissingRequiredOptionError([missing[0]]);
        }

        return validateConfig(this.options, deepFreeze(result));
    }

    /** Value of a top-level option, for guards and deferred values. */
    option(name: string): unknown {
        const value = this.resolveTop(name);
        if (value === MISSING) {
            throw new MissingRequiredOptionError([name]);
        }
        return value;
    }

    private resolveTop(name: string): unknown {
        if (this.results.has(name)) {
            return this.results.get(name);
        }
        if (this.inProgress.has(name)) {
            throw new UnresolvableGuardError([name]);
        }

        this.inProgress.add(name);
        try {
            const decl = this.options[name];
            const value = this.resolveDecl(decl, this.definitions.get(name) ?? [], [name]);
            if (value !== MISSING) {
                check(decl.type, value, [name]);
                this.logger.debug({ option: name }, 'option resolved');
            }
            this.results.set(name, value);
            return value;
        } finally {
            this.inProgress.delete(name);
        }
    }

    private resolveDecl(decl: AnyOptionDecl, defs: readonly Definition[], path: OptionPath): unknown {
        const candidates: readonly Definition[] = decl.default === undefined ? defs : [...defs, {
            value: decl.default,
            priority: OPTION_DEFAULT_PRIORITY,
            guards: [],
            source: 'default',
            passthrough: false,
        }];
        const selection = this.select(candidates, path);
        if (selection === undefined) {
            return MISSING;
        }
        return this.merge(decl.type, selection.winners, path, selection.priority);
    }

    /**
     * Drop inactive definitions and keep those at the winning priority.
     * Passthrough definitions always join the winners.
     */
    private select(defs: readonly Definition[], path: OptionPath): Selection | undefined {
        const active = defs.filter(def => this.isActive(def, path));
        if (active.length === 0) return undefined;

        const competing = active.filter(def => !def.passthrough);
        const passthrough = active.filter(def => def.passthrough);
        const ranked = competing.length > 0 ? competing : passthrough;
        const priority = Math.min(...ranked.map(def => def.priority));
        if (competing.length === 0) {
            return { priority, winners: passthrough };
        }

        const winners = competing.filter(def => def.priority === priority);
        if (winners.length < competing.length) {
            this.logger.debug(
                { option: formatPath(path), priority, discarded: competing.length - winners.length },
                'lower-priority definitions discarded',
            );
        }
        return { priority, winners: [...winners, ...passthrough] };
    }

    private isActive(def: Definition, path: OptionPath): boolean {
        for (const guard of def.guards) {
            const result = evaluateGuard(guard);
            if (typeof result !== 'boolean') {
                throw new TypeMismatchError(path, 'boolean condition', describeValue(result));
            }
            if (!result) {
                this.logger.debug({ option: formatPath(path), source: def.source }, 'inactive definition dropped');
                return false;
            }
        }
        return true;
    }

    private merge(type: TypeSpec, defs: readonly Definition[], path: OptionPath, priority: number): unknown {
        switch (type.kind) {
            case 'attrsOf':
                return this.mergeAttrs(type.elem, this.forceRecords(type, defs, path), path);
            case 'submodule':
                return this.mergeSubmodule(type.options, this.forceRecords(type, defs, path), path);
            case 'nullOr': {
                const forced = defs.map(def => ({ ...def, value: force(def.value) }));
                const present = forced.filter(def => def.value !== null);
                if (present.length === 0) return null;
                if (present.length < forced.length) {
                    throw new ConflictingOverridesError(path, priority, forced.map(def => def.value));
                }
                return this.merge(type.elem, present, path, priority);
            }
            default: {
                const nested = defs.find(def => def.passthrough);
                if (nested !== undefined) {
                    throw new TypeMismatchError(path, describeType(type), describeValue(force(nested.value)));
                }
                return mergeEqual(defs, path, priority);
            }
        }
    }

    private forceRecords(
        type: TypeSpec,
        defs: readonly Definition[],
        path: OptionPath,
    ): SourcedRecord[] {
        return defs.map(def => {
            const value = force(def.value);
            if (!isPlainRecord(value)) {
                throw new TypeMismatchError(path, describeType(type), describeValue(value));
            }
            return { record: value, source: def.source, priority: def.priority, passthrough: def.passthrough };
        });
    }

    private mergeAttrs(
        elem: TypeSpec,
        records: readonly SourcedRecord[],
        path: OptionPath,
    ): Record<string, unknown> {
        const result: Record<string, unknown> = {};
        const keys = new Set(records.flatMap(({ record }) => Object.keys(record)));

        for (const key of keys) {
            const childPath = [...path, key];
            const seeds = seedDefinitions(records, key);
            const selection = this.select(seeds, childPath);
            if (selection === undefined) continue;
            result[key] = this.merge(elem, selection.winners, childPath, selection.priority);
        }
        return result;
    }

    private mergeSubmodule(
        options: OptionSet,
        records: readonly SourcedRecord[],
        path: OptionPath,
    ): Record<string, unknown> {
        for (const { record } of records) {
            for (const key of Object.keys(record)) {
                if (!Object.hasOwn(options, key)) {
                    throw new UnknownOptionError([...path, key]);
                }
            }
        }

        const result: Record<string, unknown> = {};
        for (const [name, decl] of Object.entries(options)) {
            const childPath = [...path, name];
            const value = this.resolveDecl(decl, seedDefinitions(records, name), childPath);
            if (value === MISSING) {
                throw new MissingRequiredOptionError(childPath);
            }
            result[name] = value;
        }
        return result;
    }
}

/**
 * Nested values of container definitions. A bare nested value competes at
 * the priority of the definition holding it.
 */
function seedDefinitions(
    records: readonly SourcedRecord[],
    key: string,
): Definition[] {
    return records
        .filter(({ record }) => Object.hasOwn(record, key) && record[key] !== undefined)
        .map(({ record, source, priority, passthrough }) =>
            parseDefinition(record[key], priority, source, passthrough));
}

/** Force a top-level deferred value; nested values stay lazy. */
function force(value: unknown): unknown {
    let current = value;
    while (isDeferred(current)) {
        current = current.fn();
    }
    return current;
}

function mergeEqual(defs: readonly Definition[], path: OptionPath, priority: number): unknown {
    const values = defs.map(def => resolveDeferred(def.value));
    const [first, ...rest] = values;
    if (rest.some(value => !isDeepStrictEqual(value, first))) {
        throw new ConflictingOverridesError(path, priority, values);
    }
    return first;
}

// ─── Entry Points ───────────────────────────────────────────────────

/**
 * Resolve an option set against a list of overrides.
 *
 * @throws ResolutionError on the first type mismatch, conflict, missing
 *         option, undeclared option or cyclic guard.
 */
export function resolve<S extends OptionSet>(
    options: S,
    overrides: readonly Override[],
    settings: ResolveSettings = {},
): ConfigOf<S> {
    return new OptionResolver(options, overrides, settings.logger ?? defaultLogger).run();
}

/**
 * Evaluate modules against an option set. Each module receives the final
 * configuration as a lazy view; reads must happen inside `deferred()` values
 * or `mkIf` predicates, after every module has contributed.
 */
export function evalModules<S extends OptionSet>(
    options: S,
    modules: ReadonlyArray<ModuleFn<S>>,
    settings: ResolveSettings = {},
): ConfigOf<S> {
    let resolver: OptionResolver<S> | null = null;

    const config = new Proxy(Object.create(null) as ConfigOf<S>, {
        get(_: ConfigOf<S>, prop: string | symbol): unknown {
            if (typeof prop !== 'string' || !Object.hasOwn(options, prop)) return undefined;
            if (resolver === null) {
                throw new Error(
                    `Cannot eagerly access config.${prop} while modules are being evaluated. ` +
                    `Wrap in deferred(() => config.${prop}) or an mkIf predicate.`,
                );
            }
            return resolver.option(prop);
        },
        has(_: ConfigOf<S>, prop: string | symbol): boolean {
            return typeof prop === 'string' && Object.hasOwn(options, prop);
        },
        ownKeys(): Array<string | symbol> {
            return Object.keys(options);
        },
        getOwnPropertyDescriptor(_: ConfigOf<S>, prop: string | symbol): PropertyDescriptor | undefined {
            if (typeof prop !== 'string' || !Object.hasOwn(options, prop)) return undefined;
            // Enumerating the view must not resolve anything.
            return { get: () => resolver?.option(prop), enumerable: true, configurable: true };
        },
    });

    const overrides: Override[] = [];
    modules.forEach((mod, index) => {
        const contribution = mod(config);
        if (isOverrideList(contribution)) {
            overrides.push(...contribution);
        } else {
            overrides.push(...toOverrides(contribution, { source: `module #${index}` }));
        }
    });

    resolver = new OptionResolver(options, overrides, settings.logger ?? defaultLogger);
    return resolver.run();
}
