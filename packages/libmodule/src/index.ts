// libmodule/src/index.ts
// Public API: typed options, override resolution and resource references.

// Types
export type {
    Deferred,
    Prioritized,
    Guard,
    Conditional,
    StrType,
    IntType,
    BoolType,
    ListOfType,
    AttrsOfType,
    NullOrType,
    EitherType,
    SubmoduleType,
    ResourceType,
    TypeSpec,
    ValueOf,
    OptionDecl,
    AnyOptionDecl,
    OptionSet,
    ConfigOf,
    Override,
    Fragment,
} from './types.js';

// Errors
export {
    ResolutionError,
    TypeMismatchError,
    MissingRequiredOptionError,
    ConflictingOverridesError,
    UnresolvableGuardError,
    UnknownOptionError,
    UnknownResourceError,
    DuplicateResourceError,
    formatPath,
} from './errors.js';
export type { OptionPath, ResolutionErrorCode } from './errors.js';

// Deferred values
export { deferred, isDeferred, resolveDeferred } from './deferred.js';

// Priority system
export {
    DEFAULT_PRIORITY,
    MKDEFAULT_PRIORITY,
    MKFORCE_PRIORITY,
    OPTION_DEFAULT_PRIORITY,
    Priority,
    mkOverride,
    mkDefault,
    mkForce,
    isOverride,
} from './priority.js';

// Conditional definitions
export { mkIf, isConditional } from './conditional.js';

// Option types and declarations
export { types, describeType, describeValue, check, validate, validateConfig } from './option-types.js';
export { mkOption, isMandatory, mergeOptionSets } from './options.js';

// Definitions
export { toOverrides } from './definitions.js';
export type { ToOverridesOptions } from './definitions.js';

// Resolution
export { resolve, evalModules } from './resolve.js';
export type { ResolveSettings, ModuleFn } from './resolve.js';

// Resource modules
export { defineResource, evalResource } from './module.js';
export type { ResourceArgs, ResourceModule, ResolvedResource, EvalResourceInput } from './module.js';

// References
export {
    ResourceHandle,
    ResourceRegistry,
    resource,
    isResourceHandle,
    resolveReference,
    resolveOptionalReference,
} from './references.js';
export type { ResourceRef } from './references.js';

// Settings and logging
export { loadSettings, SettingsError, LOG_LEVELS } from './settings.js';
export type { Settings, LogLevel, EnvSource } from './settings.js';
export { logger, createLogger, createLoggerOptions } from './logger.js';
export type { Logger } from './logger.js';
