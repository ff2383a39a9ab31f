import { isDeepStrictEqual } from 'node:util';
import { FieldType, FieldValue } from './fieldTypes.js';

export type FieldConstraint =
    | { readonly type: 'AllowedValues'; readonly values: readonly FieldValue[] }
    | { readonly type: 'Range'; readonly min?: number; readonly max?: number }
    | { readonly type: 'Length'; readonly min?: number; readonly max?: number };

const RANGE_TYPES: readonly FieldType[] = ['Integer', 'Float'];
const LENGTH_TYPES: readonly FieldType[] = ['String', 'List', 'Map'];

export function describeConstraint(constraint: FieldConstraint): string {
    switch (constraint.type) {
        case 'AllowedValues':
            return `AllowedValues(${constraint.values.map(v => JSON.stringify(v)).join(', ')})`;
        case 'Range':
        case 'Length':
            return `${constraint.type}(min=${constraint.min ?? '-'}, max=${constraint.max ?? '-'})`;
    }
}

/**
 * Returns the reason a constraint cannot be declared on a field of the given
 * type, or null when the declaration is sound.
 */
export function checkConstraintDeclaration(constraint: FieldConstraint, fieldType: FieldType): string | null {
    switch (constraint.type) {
        case 'AllowedValues':
            return constraint.values.length === 0 ? 'AllowedValues needs at least one value' : null;

        case 'Range':
        case 'Length': {
            const applicable = constraint.type === 'Range' ? RANGE_TYPES : LENGTH_TYPES;
            if (!applicable.includes(fieldType)) {
                return `${constraint.type} does not apply to ${fieldType}`;
            }
            if (constraint.min === undefined && constraint.max === undefined) {
                return `${constraint.type} needs min or max`;
            }
            if (constraint.min !== undefined && constraint.max !== undefined && constraint.min > constraint.max) {
                return `${constraint.type} min ${constraint.min} exceeds max ${constraint.max}`;
            }
            return null;
        }
    }
}

function measure(value: FieldValue): number | null {
    if (typeof value === 'string' || Array.isArray(value)) {
        return value.length;
    }
    if (typeof value === 'object' && value !== null) {
        return Object.keys(value).length;
    }
    return null;
}

function checkBounds(kind: string, actual: number, min?: number, max?: number): string | null {
    if (min !== undefined && actual < min) {
        return `${kind} ${actual} is below the minimum ${min}`;
    }
    if (max !== undefined && actual > max) {
        return `${kind} ${actual} is above the maximum ${max}`;
    }
    return null;
}

/**
 * Returns a description of how the value violates the constraint, or null
 * when it satisfies it. The value is expected to match the field type already.
 */
export function checkConstraint(constraint: FieldConstraint, value: FieldValue): string | null {
    switch (constraint.type) {
        case 'AllowedValues':
            return constraint.values.some(allowed => isDeepStrictEqual(allowed, value))
                ? null
                : `${JSON.stringify(value)} is not one of the allowed values`;

        case 'Range':
            if (typeof value !== 'number') {
                return `${JSON.stringify(value)} is not a number`;
            }
            return checkBounds('value', value, constraint.min, constraint.max);

        case 'Length': {
            const length = measure(value);
            if (length === null) {
                return `${JSON.stringify(value)} has no length`;
            }
            return checkBounds('length', length, constraint.min, constraint.max);
        }
    }
}
