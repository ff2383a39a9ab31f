import { ProfileTypeError } from '../errors/profileErrors.js';
import { checkConstraintDeclaration } from '../schema/constraints.js';
import { FieldSpec } from '../schema/fieldSpec.js';
import { isFieldType } from '../schema/fieldTypes.js';
import { ProfileTypeSchema } from '../schema/profileTypeSchema.js';
import { checkSupportLedger } from '../schema/supportStatus.js';
import { compareSchemaVersions, isSchemaVersion } from '../schema/versions.js';
import { normalizeFieldValue } from '../validation/normalizer.js';

const TYPE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

/**
 * Defaults must already be in their final form: no numeric-string coercion.
 */
const STRICT = { coerce: false, partial: false } as const;

function checkField(field: FieldSpec, key: string, location: string, version: string): string[] {
    const problems: string[] = [];
    const at = `${location}.${key}`;

    if (field.name !== key) {
        problems.push(`${at}: declared under '${key}' but named '${field.name}'`);
    }
    if (!isFieldType(field.type)) {
        problems.push(`${at}: unknown type '${String(field.type)}'`);
        return problems;
    }

    if (field.required && field.default !== undefined) {
        problems.push(`${at}: a required field cannot have a default`);
    }

    if (field.itemSchema && field.type !== 'List') {
        problems.push(`${at}: item schema valid only for List, not ${field.type}`);
    }
    if (field.entrySchema && field.type !== 'Map') {
        problems.push(`${at}: entry schema valid only for Map, not ${field.type}`);
    }
    if (field.itemSchema) {
        problems.push(...checkField(field.itemSchema, '*', at, version));
    }
    if (field.entrySchema) {
        for (const [childKey, child] of field.entrySchema) {
            problems.push(...checkField(child, childKey, at, version));
        }
    }

    for (const constraint of field.constraints) {
        const problem = checkConstraintDeclaration(constraint, field.type);
        if (problem !== null) {
            problems.push(`${at}: ${problem}`);
        }
    }

    for (const [bound, value] of [['min_version', field.minVersion], ['max_version', field.maxVersion]] as const) {
        if (value !== undefined && !isSchemaVersion(value)) {
            problems.push(`${at}: malformed ${bound} '${value}'`);
        }
    }
    if (field.minVersion !== undefined && field.maxVersion !== undefined
        && isSchemaVersion(field.minVersion) && isSchemaVersion(field.maxVersion)
        && compareSchemaVersions(field.minVersion, field.maxVersion) > 0) {
        problems.push(`${at}: min_version ${field.minVersion} is after max_version ${field.maxVersion}`);
    }

    // Only check the default once the declaration itself is sound.
    if (problems.length === 0 && field.default !== undefined) {
        try {
            normalizeFieldValue(field, field.default, at, version, STRICT);
        } catch (err) {
            if (!(err instanceof ProfileTypeError)) {
                throw err;
            }
            problems.push(`${at}: invalid default ${JSON.stringify(field.default)}: ${err.message}`);
        }
    }

    return problems;
}

/**
 * Returns every invariant the schema violates; an empty list means the
 * schema can be registered.
 */
export function checkProfileTypeSchema(schema: ProfileTypeSchema): string[] {
    const problems: string[] = [];

    if (!TYPE_NAME_PATTERN.test(schema.typeName)) {
        problems.push(`type_name: malformed '${schema.typeName}'`);
    }
    if (!isSchemaVersion(schema.version)) {
        problems.push(`version: malformed '${schema.version}', expected major.minor`);
    }

    for (const [key, field] of schema.fields) {
        problems.push(...checkField(field, key, 'schema', schema.version));
    }

    problems.push(...checkSupportLedger(schema.supportStatus, `support_status.${schema.version}`));

    return problems;
}
