/**
 * Profile specification validator and normalizer.
 *
 * Turns a raw, user-supplied specification into a ProfileSpec for one
 * schema: unknown keys are rejected, declared fields are type-checked (with
 * the numeric-string coercion as the only conversion), constraints are
 * enforced, missing required fields are reported and defaults are filled in
 * as normalized deep copies. Lists and maps are copied, never shared with the
 * caller.
 *
 * Everything here is pure: the same schema and input always give the same
 * spec or the same error, inputs are never mutated and nothing is logged.
 */

import {
    ConstraintViolationError,
    MissingRequiredFieldError,
    TypeMismatchError,
    UnknownFieldError
} from '../errors/profileErrors.js';
import { checkConstraint, describeConstraint } from '../schema/constraints.js';
import { FieldSpec, isFieldActive, isFieldAtMaxVersion } from '../schema/fieldSpec.js';
import {
    FieldMap,
    FieldValue,
    coerceValue,
    deepFreeze,
    describeValue,
    isPlainObject
} from '../schema/fieldTypes.js';
import { ProfileSpec } from '../schema/profileSpec.js';
import { ProfileTypeSchema, schemaKey } from '../schema/profileTypeSchema.js';

/** Path reported when the specification itself is not a map */
export const SPEC_ROOT = '(spec)';

export interface NormalizeOptions {
    /** Accept numeric strings for Integer and Float fields */
    readonly coerce: boolean;
    /** Only check the keys present: no defaults, no required check */
    readonly partial: boolean;
}

export interface ValidationOutcome {
    readonly spec: ProfileSpec;
    /** Fields supplied at the last version they exist in */
    readonly warnings: readonly string[];
}

const FULL: NormalizeOptions = { coerce: true, partial: false };
const PATCH: NormalizeOptions = { coerce: true, partial: true };
/** Defaults are checked strictly at registration and only need expanding here */
const DEFAULT_VALUE: NormalizeOptions = { coerce: false, partial: false };

function joinPath(prefix: string, key: string | number): string {
    return prefix === '' ? String(key) : `${prefix}.${key}`;
}

/**
 * Checks one value against a field declaration and returns its normalized
 * form.
 */
export function normalizeFieldValue(
    field: FieldSpec,
    value: unknown,
    path: string,
    version: string,
    options: NormalizeOptions,
    warnings: string[] = []
): FieldValue {
    const coerced = coerceValue(field.type, value, options.coerce);
    if (!coerced.ok) {
        throw new TypeMismatchError(path, field.type, describeValue(value));
    }

    let result = coerced.value;

    if (field.itemSchema && Array.isArray(result)) {
        const itemSchema = field.itemSchema;
        result = result.map((item, index) =>
            normalizeFieldValue(itemSchema, item, joinPath(path, index), version, options, warnings)
        );
    } else if (field.entrySchema && isPlainObject(result)) {
        // nested maps are always complete, even inside a partial patch
        result = normalizeFields(field.entrySchema, result, path, version, { ...options, partial: false }, warnings);
    } else if (typeof result === 'object' && result !== null) {
        // the caller's own list or map is never shared or frozen
        result = structuredClone(result);
    }

    for (const constraint of field.constraints) {
        const violation = checkConstraint(constraint, result);
        if (violation !== null) {
            throw new ConstraintViolationError(path, describeConstraint(constraint), violation);
        }
    }

    return result;
}

/**
 * Normalizes a map of values against a set of field declarations.
 */
export function normalizeFields(
    fields: ReadonlyMap<string, FieldSpec>,
    raw: Readonly<Record<string, unknown>>,
    prefix: string,
    version: string,
    options: NormalizeOptions,
    warnings: string[] = []
): FieldMap {
    const active = [...fields.values()].filter(field => isFieldActive(field, version));
    const declared = new Set(active.map(field => field.name));

    for (const key of Object.keys(raw).sort()) {
        if (!declared.has(key)) {
            throw new UnknownFieldError(joinPath(prefix, key));
        }
    }

    const normalized: FieldMap = {};

    for (const field of active) {
        const path = joinPath(prefix, field.name);
        const value = Object.hasOwn(raw, field.name) ? raw[field.name] : undefined;

        if (value !== undefined) {
            normalized[field.name] = normalizeFieldValue(field, value, path, version, options, warnings);
            if (isFieldAtMaxVersion(field, version)) {
                warnings.push(`Field '${path}' is not available after version ${version}`);
            }
            continue;
        }

        if (options.partial) {
            continue;
        }

        if (field.required) {
            throw new MissingRequiredFieldError(path);
        }

        if (field.default !== undefined) {
            // nested entry defaults apply inside a defaulted map as well
            normalized[field.name] = normalizeFieldValue(field, field.default, path, version, DEFAULT_VALUE);
        }
    }

    return normalized;
}

function requireMap(raw: unknown, schema: ProfileTypeSchema): Readonly<Record<string, unknown>> {
    if (!isPlainObject(raw)) {
        throw new TypeMismatchError(SPEC_ROOT, `Map of ${schemaKey(schema.typeName, schema.version)} fields`, describeValue(raw));
    }
    return raw;
}

/**
 * Validates a complete specification and returns the normalized ProfileSpec.
 *
 * Optional fields that have neither a value nor a default stay absent.
 *
 * @throws UnknownFieldError, MissingRequiredFieldError, TypeMismatchError, ConstraintViolationError
 */
export function validateSpec(schema: ProfileTypeSchema, raw: unknown): ValidationOutcome {
    const warnings: string[] = [];
    const properties = normalizeFields(schema.fields, requireMap(raw, schema), '', schema.version, FULL, warnings);

    return {
        spec: Object.freeze({
            typeName: schema.typeName,
            version: schema.version,
            properties: deepFreeze(properties)
        }),
        warnings: Object.freeze(warnings)
    };
}

/**
 * Validates only the fields present in a partial update. The result is the
 * normalized patch, ready for update authorization.
 *
 * @throws UnknownFieldError, TypeMismatchError, ConstraintViolationError
 */
export function validatePatch(schema: ProfileTypeSchema, raw: unknown): Readonly<FieldMap> {
    return deepFreeze(normalizeFields(schema.fields, requireMap(raw, schema), '', schema.version, PATCH));
}
