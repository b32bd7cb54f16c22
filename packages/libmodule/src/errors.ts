// libmodule/src/errors.ts
// Resolution error taxonomy. Every error carries a stable `code`; option
// errors also carry the dotted path of the offending option.

export type OptionPath = readonly string[];

export type ResolutionErrorCode =
    | 'TYPE_MISMATCH'
    | 'MISSING_REQUIRED_OPTION'
    | 'CONFLICTING_OVERRIDES'
    | 'UNRESOLVABLE_GUARD'
    | 'UNKNOWN_OPTION'
    | 'UNKNOWN_RESOURCE'
    | 'DUPLICATE_RESOURCE';

/** Render an option path as `a.b.c`, or `<root>` for the empty path. */
export function formatPath(path: OptionPath): string {
    return path.length > 0 ? path.join('.') : '<root>';
}

export abstract class ResolutionError extends Error {
    abstract readonly code: ResolutionErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class TypeMismatchError extends ResolutionError {
    readonly code = 'TYPE_MISMATCH';

    constructor(
        readonly path: OptionPath,
        readonly expected: string,
        readonly got: string,
    ) {
        super(`Option "${formatPath(path)}" is not of type ${expected}: got ${got}.`);
    }
}

export class MissingRequiredOptionError extends ResolutionError {
    readonly code = 'MISSING_REQUIRED_OPTION';

    constructor(readonly path: OptionPath) {
        super(`Option "${formatPath(path)}" is used but not defined.`);
    }
}

export class ConflictingOverridesError extends ResolutionError {
    readonly code = 'CONFLICTING_OVERRIDES';

    constructor(
        readonly path: OptionPath,
        readonly priority: number,
        readonly values: readonly unknown[],
    ) {
        super(
            `Conflicting definitions for option "${formatPath(path)}": ` +
            `values ${values.map(v => JSON.stringify(v)).join(' vs ')} ` +
            `at same priority ${priority}. ` +
            `Use different mkOverride priorities to resolve.`,
        );
    }
}

export class UnresolvableGuardError extends ResolutionError {
    readonly code = 'UNRESOLVABLE_GUARD';

    constructor(readonly path: OptionPath) {
        super(`Infinite recursion while resolving option "${formatPath(path)}": it depends on its own value.`);
    }
}

export class UnknownOptionError extends ResolutionError {
    readonly code = 'UNKNOWN_OPTION';

    constructor(readonly path: OptionPath) {
        super(`The option "${formatPath(path)}" does not exist.`);
    }
}

export class UnknownResourceError extends ResolutionError {
    readonly code = 'UNKNOWN_RESOURCE';

    constructor(readonly kind: string, readonly resourceName: string) {
        super(`No resource of kind "${kind}" named "${resourceName}" is declared.`);
    }
}

export class DuplicateResourceError extends ResolutionError {
    readonly code = 'DUPLICATE_RESOURCE';

    constructor(readonly kind: string, readonly resourceName: string) {
        super(`Resource of kind "${kind}" named "${resourceName}" is already declared.`);
    }
}
