// libmodule/src/module.ts
// Resource modules: one option set plus a config block of module-supplied
// definitions, evaluated together with a user's declaration of a resource.

import { toOverrides } from './definitions.js';
import { evalModules } from './resolve.js';
import type { ModuleFn, ResolveSettings } from './resolve.js';
import type { ConfigOf, Fragment, OptionSet, Override } from './types.js';

/** Per-resource arguments available to a module's config block. */
export interface ResourceArgs {
    /** Name of the resource within the deployment. */
    readonly name: string;
    /** Identifier unique to the deployment. */
    readonly uuid: string;
}

export interface ResourceModule<S extends OptionSet> {
    /** Resource kind tag, e.g. `azure-virtual-network`. */
    readonly kind: string;
    readonly options: S;
    readonly config?: (config: ConfigOf<S>, args: ResourceArgs) => Fragment;
}

/** A resolved resource, ready for the deployment backend. */
export interface ResolvedResource<S extends OptionSet> {
    readonly kind: string;
    readonly name: string;
    readonly config: ConfigOf<S>;
}

export interface EvalResourceInput extends ResourceArgs {
    /** The user's declaration; bare values are ordinary definitions. */
    readonly definitions?: Fragment | readonly Fragment[];
    readonly overrides?: readonly Override[];
}

export function defineResource<S extends OptionSet>(module: ResourceModule<S>): ResourceModule<S> {
    return module;
}

/**
 * Resolve one declared resource: the module's config block, the user's
 * fragments and any explicit overrides.
 */
export function evalResource<S extends OptionSet>(
    module: ResourceModule<S>,
    input: EvalResourceInput,
    settings: ResolveSettings = {},
): ResolvedResource<S> {
    const args: ResourceArgs = { name: input.name, uuid: input.uuid };
    const fragments: readonly Fragment[] =
        input.definitions === undefined ? [] :
        isFragmentList(input.definitions) ? input.definitions : [input.definitions];

    const modules: Array<ModuleFn<S>> = [];
    const moduleConfig = module.config;
    if (moduleConfig !== undefined) {
        modules.push(config => toOverrides(moduleConfig(config, args), { source: `${module.kind} module` }));
    }
    for (const fragment of fragments) {
        modules.push(() => toOverrides(fragment, { source: input.name }));
    }
    if (input.overrides !== undefined) {
        const overrides = input.overrides;
        modules.push(() => overrides);
    }

    return {
        kind: module.kind,
        name: input.name,
        config: evalModules(module.options, modules, settings),
    };
}

function isFragmentList(val: Fragment | readonly Fragment[]): val is readonly Fragment[] {
    return Array.isArray(val);
}
