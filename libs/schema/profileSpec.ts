import { FieldMap, FieldValue } from './fieldTypes.js';

/**
 * A validated profile specification: values for the declared fields of
 * exactly one profile type version. Produced frozen by the validator and by
 * update authorization; owned by the caller afterwards.
 */
export interface ProfileSpec {
    readonly typeName: string;
    readonly version: string;
    readonly properties: Readonly<FieldMap>;
}

/**
 * Partial set of field values proposed by an update. A field that is absent
 * (or undefined) keeps its current value.
 */
export type ProfileSpecPatch = Readonly<Record<string, FieldValue | undefined>>;
