// libmodule/src/options.ts
// Option declarations.

import { check } from './option-types.js';
import type { OptionDecl, OptionSet, TypeSpec } from './types.js';

/**
 * Declare an option. The declared default is checked against the type
 * statically and again at declaration time.
 *
 * @example
 * location: mkOption({
 *   type: types.str,
 *   example: 'westus',
 *   description: 'The data center location.',
 * })
 */
export function mkOption<T extends TypeSpec>(decl: OptionDecl<T>): OptionDecl<T> {
    if (decl.default !== undefined) {
        check(decl.type, decl.default);
    }
    return decl;
}

/** True when the option has no declared default. */
export function isMandatory(decl: OptionSet[string]): boolean {
    return decl.default === undefined;
}

/**
 * Merge option sets contributed by several modules. A name declared twice
 * is an error.
 */
export function mergeOptionSets<A extends OptionSet, B extends OptionSet>(a: A, b: B): A & B {
    for (const name of Object.keys(b)) {
        if (Object.hasOwn(a, name)) {
            throw new Error(`The option "${name}" is declared more than once.`);
        }
    }
    return { ...a, ...b };
}
