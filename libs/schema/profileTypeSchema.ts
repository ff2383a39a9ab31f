/**
 * Profile type schema model.
 *
 * A ProfileTypeSchema is the unit the registry stores: the fields of one
 * profile type at one version, plus that version's support status ledger.
 * Schemas are frozen when defined and never change afterwards; a new
 * definition means a new schema instance.
 */

import { FieldSpec, FieldSpecInput, defineFields, isFieldActive } from './fieldSpec.js';
import { SupportStatusEntry } from './supportStatus.js';

export interface ProfileTypeSchema {
    /** Stable identifier such as `os.heat.stack` */
    readonly typeName: string;
    /** `major.minor` version */
    readonly version: string;
    readonly description?: string;
    /** Declared fields in declaration order */
    readonly fields: ReadonlyMap<string, FieldSpec>;
    /** Status history of this version, oldest release first */
    readonly supportStatus: readonly SupportStatusEntry[];
}

export interface ProfileTypeSchemaInput {
    typeName: string;
    version: string;
    description?: string;
    fields: Record<string, FieldSpecInput>;
    supportStatus: SupportStatusEntry[];
}

export function defineProfileType(input: ProfileTypeSchemaInput): ProfileTypeSchema {
    return Object.freeze({
        typeName: input.typeName,
        version: input.version,
        ...(input.description !== undefined && { description: input.description }),
        fields: defineFields(input.fields),
        supportStatus: Object.freeze(input.supportStatus.map(entry => Object.freeze({ ...entry })))
    });
}

/**
 * Registry key and display name of a schema, e.g. `os.heat.stack-1.0`.
 */
export function schemaKey(typeName: string, version: string): string {
    return `${typeName}-${version}`;
}

/**
 * Fields that exist at the schema's own version, in declaration order.
 */
export function activeFields(fields: ReadonlyMap<string, FieldSpec>, version: string): Map<string, FieldSpec> {
    return new Map([...fields].filter(([, field]) => isFieldActive(field, version)));
}
