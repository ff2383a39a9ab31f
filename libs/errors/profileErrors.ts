/**
 * Profile type error taxonomy.
 *
 * Every failure the engine reports is one of these classes. Core functions
 * throw them; the engine facade returns them inside a failed result. None of
 * them is fatal to the process.
 */

export type ProfileTypeErrorCode =
    | 'DUPLICATE_SCHEMA'
    | 'INVALID_SCHEMA'
    | 'UNKNOWN_SCHEMA'
    | 'MISSING_REQUIRED_FIELD'
    | 'UNKNOWN_FIELD'
    | 'TYPE_MISMATCH'
    | 'CONSTRAINT_VIOLATION'
    | 'IMMUTABLE_FIELD_CHANGED'
    | 'UNSUPPORTED_VERSION'
    | 'REGISTRY_SEALED'
    | 'ENGINE_INTERNAL';

export type ProfileTypeErrorCategory = 'SCHEMA' | 'SPEC' | 'UPDATE' | 'SUPPORT' | 'INTERNAL';

export abstract class ProfileTypeError extends Error {
    abstract readonly code: ProfileTypeErrorCode;
    abstract readonly category: ProfileTypeErrorCategory;

    protected constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }

    /**
     * Plain representation for logs and transport layers.
     */
    toJSON(): Record<string, unknown> {
        return { code: this.code, category: this.category, message: this.message };
    }
}

// =============================================================================
// REGISTRATION
// =============================================================================

export class DuplicateSchemaError extends ProfileTypeError {
    readonly code = 'DUPLICATE_SCHEMA' as const;
    readonly category = 'SCHEMA' as const;

    constructor(public readonly typeName: string, public readonly version: string) {
        super(`Profile type ${typeName}-${version} is already registered`);
    }
}

export class InvalidSchemaError extends ProfileTypeError {
    readonly code = 'INVALID_SCHEMA' as const;
    readonly category = 'SCHEMA' as const;

    /**
     * @param problems every invariant the schema violates, each prefixed with its location
     */
    constructor(public readonly problems: readonly string[], context?: string) {
        super(`${context ? `${context}: ` : ''}${problems.join('; ')}`);
    }
}

export class RegistrySealedError extends ProfileTypeError {
    readonly code = 'REGISTRY_SEALED' as const;
    readonly category = 'SCHEMA' as const;

    constructor(public readonly typeName: string, public readonly version: string) {
        super(`Registry is sealed; cannot register ${typeName}-${version}. Replace the snapshot instead`);
    }
}

export class UnknownSchemaError extends ProfileTypeError {
    readonly code = 'UNKNOWN_SCHEMA' as const;
    readonly category = 'SCHEMA' as const;

    constructor(public readonly typeName: string, public readonly version?: string) {
        super(version === undefined
            ? `No profile type named ${typeName} is registered`
            : `Profile type ${typeName}-${version} is not registered`);
    }
}

// =============================================================================
// SPECIFICATION
// =============================================================================

export class MissingRequiredFieldError extends ProfileTypeError {
    readonly code = 'MISSING_REQUIRED_FIELD' as const;
    readonly category = 'SPEC' as const;

    constructor(public readonly field: string) {
        super(`Required field '${field}' is missing`);
    }
}

export class UnknownFieldError extends ProfileTypeError {
    readonly code = 'UNKNOWN_FIELD' as const;
    readonly category = 'SPEC' as const;

    constructor(public readonly field: string) {
        super(`Unrecognizable field '${field}'`);
    }
}

export class TypeMismatchError extends ProfileTypeError {
    readonly code = 'TYPE_MISMATCH' as const;
    readonly category = 'SPEC' as const;

    constructor(
        public readonly field: string,
        public readonly expected: string,
        public readonly received: string
    ) {
        super(`Field '${field}' expects ${expected}, received ${received}`);
    }
}

export class ConstraintViolationError extends ProfileTypeError {
    readonly code = 'CONSTRAINT_VIOLATION' as const;
    readonly category = 'SPEC' as const;

    constructor(public readonly field: string, public readonly constraint: string, detail: string) {
        super(`Field '${field}' violates ${constraint}: ${detail}`);
    }
}

// =============================================================================
// UPDATE / SUPPORT
// =============================================================================

export class ImmutableFieldChangedError extends ProfileTypeError {
    readonly code = 'IMMUTABLE_FIELD_CHANGED' as const;
    readonly category = 'UPDATE' as const;

    constructor(
        public readonly field: string,
        public readonly currentValue: unknown,
        public readonly proposedValue: unknown
    ) {
        super(`Field '${field}' cannot be updated from ${JSON.stringify(currentValue) ?? 'unset'} to ${JSON.stringify(proposedValue) ?? 'unset'}`);
    }
}

export class UnsupportedVersionError extends ProfileTypeError {
    readonly code = 'UNSUPPORTED_VERSION' as const;
    readonly category = 'SUPPORT' as const;

    constructor(
        public readonly typeName: string,
        public readonly version: string,
        public readonly release: string,
        reason: string
    ) {
        super(`Profile type ${typeName}-${version} is not usable at release ${release}: ${reason}`);
    }
}

export class EngineInternalError extends ProfileTypeError {
    readonly code = 'ENGINE_INTERNAL' as const;
    readonly category = 'INTERNAL' as const;

    constructor(
        message: string,
        public readonly incidentId: string,
        public readonly contextLabel: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export function isProfileTypeError(err: unknown): err is ProfileTypeError {
    return err instanceof ProfileTypeError;
}
