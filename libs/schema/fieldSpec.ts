import { FieldConstraint } from './constraints.js';
import { FieldType, FieldValue, deepFreeze } from './fieldTypes.js';
import { compareSchemaVersions, isSchemaVersion } from './versions.js';

/**
 * One declared field of a profile type schema.
 */
export interface FieldSpec {
    /** Field name, unique within its schema (or within its parent Map schema) */
    readonly name: string;
    readonly type: FieldType;
    /** Applied when the field is absent; never set on a required field */
    readonly default?: FieldValue;
    readonly required: boolean;
    /** Whether the value may change after the profile is created */
    readonly updatable: boolean;
    /** Free text for humans; no effect on validation */
    readonly description: string;
    /** Schema of every item of a List field */
    readonly itemSchema?: FieldSpec;
    /** Declared keys of a Map field */
    readonly entrySchema?: ReadonlyMap<string, FieldSpec>;
    readonly constraints: readonly FieldConstraint[];
    /** First schema version the field exists in */
    readonly minVersion?: string;
    /** Last schema version the field exists in */
    readonly maxVersion?: string;
}

/**
 * Authoring shape of a field: everything but `type` is optional and nested
 * schemas are plain records.
 */
export interface FieldSpecInput {
    type: FieldType;
    default?: FieldValue;
    required?: boolean;
    updatable?: boolean;
    description?: string;
    itemSchema?: FieldSpecInput;
    entrySchema?: Record<string, FieldSpecInput>;
    constraints?: FieldConstraint[];
    minVersion?: string;
    maxVersion?: string;
}

/**
 * Builds a frozen FieldSpec. No invariant is checked here; the registry
 * checks them when the owning schema is registered.
 */
export function defineField(name: string, input: FieldSpecInput): FieldSpec {
    const field: FieldSpec = {
        name,
        type: input.type,
        required: input.required ?? false,
        updatable: input.updatable ?? false,
        description: input.description ?? '',
        constraints: Object.freeze([...(input.constraints ?? [])]),
        ...(input.default !== undefined && { default: deepFreeze(structuredClone(input.default)) }),
        ...(input.itemSchema && { itemSchema: defineField('*', input.itemSchema) }),
        ...(input.entrySchema && { entrySchema: defineFields(input.entrySchema) }),
        ...(input.minVersion !== undefined && { minVersion: input.minVersion }),
        ...(input.maxVersion !== undefined && { maxVersion: input.maxVersion })
    };
    return Object.freeze(field);
}

export function defineFields(inputs: Record<string, FieldSpecInput>): ReadonlyMap<string, FieldSpec> {
    return new Map(Object.entries(inputs).map(([name, input]) => [name, defineField(name, input)]));
}

/**
 * Whether the field exists in the given schema version. Malformed window
 * bounds are reported at registration and never match here.
 */
export function isFieldActive(field: FieldSpec, version: string): boolean {
    if (!isSchemaVersion(version)) {
        return field.minVersion === undefined && field.maxVersion === undefined;
    }
    if (field.minVersion !== undefined
        && (!isSchemaVersion(field.minVersion) || compareSchemaVersions(version, field.minVersion) < 0)) {
        return false;
    }
    if (field.maxVersion !== undefined
        && (!isSchemaVersion(field.maxVersion) || compareSchemaVersions(version, field.maxVersion) > 0)) {
        return false;
    }
    return true;
}

/**
 * Whether the given version is the last one the field exists in.
 */
export function isFieldAtMaxVersion(field: FieldSpec, version: string): boolean {
    return field.maxVersion !== undefined
        && isSchemaVersion(field.maxVersion)
        && isSchemaVersion(version)
        && compareSchemaVersions(field.maxVersion, version) === 0;
}
