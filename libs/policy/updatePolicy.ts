/**
 * Update Policy Enforcer
 *
 * Decides whether a proposed change to a validated profile spec is allowed.
 * An update is a partial patch: fields the patch leaves out (or sets to
 * undefined) keep their current value, and there is no way to unset a field
 * through an update. A field counts as changed when its proposed value is not
 * deeply equal to its current one; changing a field declared with
 * `updatable: false` is refused.
 *
 * Shape checks are not repeated here. Callers validate the patch first
 * (validatePatch) and then authorize it.
 */

import { isDeepStrictEqual } from 'node:util';
import {
    ImmutableFieldChangedError,
    TypeMismatchError,
    UnknownFieldError
} from '../errors/profileErrors.js';
import { FieldMap, deepFreeze } from '../schema/fieldTypes.js';
import { ProfileSpec, ProfileSpecPatch } from '../schema/profileSpec.js';
import { ProfileTypeSchema, activeFields, schemaKey } from '../schema/profileTypeSchema.js';
import { SPEC_ROOT } from '../validation/normalizer.js';

export interface FieldChange {
    readonly field: string;
    readonly from: FieldMap[string] | undefined;
    readonly to: FieldMap[string];
}

/**
 * Lists the fields a patch would change, in declaration order.
 *
 * @throws UnknownFieldError for a patch key the schema does not declare
 */
export function diffSpec(schema: ProfileTypeSchema, current: ProfileSpec, proposed: ProfileSpecPatch): FieldChange[] {
    const fields = activeFields(schema.fields, schema.version);

    for (const key of Object.keys(proposed).sort()) {
        if (!fields.has(key)) {
            throw new UnknownFieldError(key);
        }
    }

    const changes: FieldChange[] = [];
    for (const name of fields.keys()) {
        const to = proposed[name];
        if (to === undefined) {
            continue;
        }
        const from = current.properties[name];
        if (!isDeepStrictEqual(from, to)) {
            changes.push({ field: name, from, to });
        }
    }
    return changes;
}

/**
 * Applies a patch to a spec if every changed field is updatable.
 *
 * @returns the merged spec: current values overlaid with the changed ones
 * @throws ImmutableFieldChangedError naming the first non-updatable field changed
 * @throws UnknownFieldError for a patch key the schema does not declare
 * @throws TypeMismatchError when `current` belongs to another profile type version
 */
export function authorizeUpdate(schema: ProfileTypeSchema, current: ProfileSpec, proposed: ProfileSpecPatch): ProfileSpec {
    if (current.typeName !== schema.typeName || current.version !== schema.version) {
        throw new TypeMismatchError(
            SPEC_ROOT,
            `spec of ${schemaKey(schema.typeName, schema.version)}`,
            `spec of ${schemaKey(current.typeName, current.version)}`
        );
    }

    const changes = diffSpec(schema, current, proposed);

    for (const change of changes) {
        const field = schema.fields.get(change.field);
        if (!field?.updatable) {
            throw new ImmutableFieldChangedError(change.field, change.from, change.to);
        }
    }

    const merged: FieldMap = structuredClone(current.properties);
    for (const change of changes) {
        merged[change.field] = structuredClone(change.to);
    }

    return Object.freeze({
        typeName: schema.typeName,
        version: schema.version,
        properties: deepFreeze(merged)
    });
}
